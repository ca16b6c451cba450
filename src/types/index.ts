export type NodeId = string;

/** Placeholder id carried by templates; replaced on instantiation. */
export const TEMPLATE_ID: NodeId = '';

export type Color = string;

/** Either a value set on the node itself, or a fall-through to the nearest ancestor. */
export type Inheritable<T> = { kind: 'local'; value: T } | { kind: 'inherit' };

export type Length = { kind: 'fixed'; value: number } | { kind: 'fill'; portion: number } | { kind: 'fit' };

export type Spacing = { x: number; y: number; locked: boolean };

export type Padding = { top: number; right: number; bottom: number; left: number; locked: boolean };

export type BorderWidth = Padding;

export type BorderCorner = {
  topLeft: number;
  topRight: number;
  bottomRight: number;
  bottomLeft: number;
  locked: boolean;
};

export type BorderStyle = 'solid' | 'dashed' | 'dotted';

export type Border = {
  color: Color;
  style: BorderStyle;
  width: BorderWidth;
  corner: BorderCorner;
};

export type Transformation = {
  offsetX: number;
  offsetY: number;
  /** Degrees, clockwise. */
  rotation: number;
  scale: number;
};

export type Shadow = {
  offsetX: number;
  offsetY: number;
  size: number;
  blur: number;
  color: Color;
  kind: 'inner' | 'outer';
};

export type Background = { kind: 'none' } | { kind: 'solid'; color: Color } | { kind: 'image'; url: string };

export type Alignment = 'none' | 'start' | 'center' | 'end' | 'stretch';

export type TextAlignment = 'left' | 'center' | 'right' | 'justify';

export type Position = 'normal' | 'inFront';

export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;

export type ImageData = {
  src: string;
  description: string;
  width: number | null;
  height: number | null;
  mimeType: string | null;
};

/**
 * Closed set of node kinds. Adding a variant makes every exhaustive switch
 * over `NodeKind` (placement rules, codec) fail to compile until handled.
 */
export type NodeType =
  | { kind: 'document' }
  | { kind: 'page' }
  | { kind: 'row'; wrapped: boolean }
  | { kind: 'column' }
  | { kind: 'textColumn' }
  | { kind: 'heading'; text: string; level: HeadingLevel }
  | { kind: 'paragraph'; text: string }
  | { kind: 'text'; text: string }
  | { kind: 'image'; image: ImageData }
  | { kind: 'button'; text: string }
  | { kind: 'checkbox'; text: string }
  | { kind: 'textField'; text: string }
  | { kind: 'textFieldMultiline'; text: string }
  | { kind: 'radio'; text: string }
  | { kind: 'option'; text: string };

export type NodeKind = NodeType['kind'];

export type DesignNode = {
  readonly id: NodeId;
  readonly name: string;
  readonly type: NodeType;
  readonly width: Length;
  readonly widthMin: number | null;
  readonly widthMax: number | null;
  readonly height: Length;
  readonly heightMin: number | null;
  readonly heightMax: number | null;
  readonly spacing: Spacing;
  readonly padding: Padding;
  readonly transformation: Transformation;
  readonly border: Border;
  readonly shadow: Shadow;
  readonly background: Background;
  readonly fontFamily: Inheritable<string>;
  readonly fontColor: Inheritable<Color>;
  readonly fontSize: Inheritable<number>;
  readonly fontWeight: Inheritable<number>;
  readonly letterSpacing: number;
  readonly wordSpacing: number;
  readonly textAlignment: TextAlignment;
  readonly alignmentX: Alignment;
  readonly alignmentY: Alignment;
  readonly position: Position;
};

export function local<T>(value: T): Inheritable<T> {
  return { kind: 'local', value };
}

export const inherit: { kind: 'inherit' } = { kind: 'inherit' };
