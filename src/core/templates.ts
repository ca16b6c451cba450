import type { DesignNode, HeadingLevel, NodeType } from '../types';
import { TEMPLATE_ID, inherit, local } from '../types';
import type { Seed } from './ids';
import { cloneWithFreshIds } from './ids';
import type { Tree } from './tree';
import { singleton, tree } from './tree';

/** A node tree whose ids are still `TEMPLATE_ID`. */
export type Template = Tree<DesignNode>;

export type TemplateGroup = { label: string; items: Template[] };

export function defaultNode(type: NodeType, name: string): DesignNode {
  return {
    id: TEMPLATE_ID,
    name,
    type,
    width: { kind: 'fit' },
    widthMin: null,
    widthMax: null,
    height: { kind: 'fit' },
    heightMin: null,
    heightMax: null,
    spacing: { x: 0, y: 0, locked: false },
    padding: { top: 0, right: 0, bottom: 0, left: 0, locked: false },
    transformation: { offsetX: 0, offsetY: 0, rotation: 0, scale: 1 },
    border: {
      color: '#000000',
      style: 'solid',
      width: { top: 0, right: 0, bottom: 0, left: 0, locked: true },
      corner: { topLeft: 0, topRight: 0, bottomRight: 0, bottomLeft: 0, locked: true },
    },
    shadow: { offsetX: 0, offsetY: 0, size: 0, blur: 0, color: '#000000', kind: 'outer' },
    background: { kind: 'none' },
    fontFamily: inherit,
    fontColor: inherit,
    fontSize: inherit,
    fontWeight: inherit,
    letterSpacing: 0,
    wordSpacing: 0,
    textAlignment: 'left',
    alignmentX: 'none',
    alignmentY: 'none',
    position: 'normal',
  };
}

const fill = { kind: 'fill', portion: 1 } as const;

/** Root node of a fresh document. Sets every inheritable font property. */
export function documentTemplate(): Template {
  return singleton({
    ...defaultNode({ kind: 'document' }, 'Document'),
    fontFamily: local('system-ui'),
    fontColor: local('#000000'),
    fontSize: local(16),
    fontWeight: local(400),
  });
}

export function pageTemplate(): Template {
  return singleton({
    ...defaultNode({ kind: 'page' }, 'Page'),
    width: fill,
    height: fill,
    background: { kind: 'solid', color: '#ffffff' },
  });
}

export function rowTemplate(): Template {
  return singleton({ ...defaultNode({ kind: 'row', wrapped: false }, 'Row'), width: fill, spacing: { x: 20, y: 20, locked: false } });
}

export function columnTemplate(): Template {
  return singleton({ ...defaultNode({ kind: 'column' }, 'Column'), width: fill, spacing: { x: 20, y: 20, locked: false } });
}

export function textColumnTemplate(): Template {
  return singleton({ ...defaultNode({ kind: 'textColumn' }, 'Text Column'), width: fill, spacing: { x: 20, y: 20, locked: false } });
}

export function headingTemplate(level: HeadingLevel = 1): Template {
  const sizes: Record<HeadingLevel, number> = { 1: 36, 2: 28, 3: 24, 4: 20, 5: 18, 6: 16 };
  return singleton({
    ...defaultNode({ kind: 'heading', text: 'Heading', level }, `Heading ${level}`),
    fontSize: local(sizes[level]),
    fontWeight: local(700),
  });
}

export function paragraphTemplate(): Template {
  return singleton({
    ...defaultNode({ kind: 'paragraph', text: 'Lorem ipsum dolor sit amet, consectetur adipiscing elit.' }, 'Paragraph'),
    width: fill,
  });
}

export function textTemplate(): Template {
  return singleton(defaultNode({ kind: 'text', text: 'Text' }, 'Text'));
}

export function imageTemplate(src = ''): Template {
  return singleton(
    defaultNode({ kind: 'image', image: { src, description: '', width: null, height: null, mimeType: null } }, 'Image'),
  );
}

export function buttonTemplate(): Template {
  return singleton({
    ...defaultNode({ kind: 'button', text: 'Button' }, 'Button'),
    padding: { top: 10, right: 20, bottom: 10, left: 20, locked: false },
    background: { kind: 'solid', color: '#1a73e8' },
    fontColor: local('#ffffff'),
  });
}

export function checkboxTemplate(): Template {
  return singleton(defaultNode({ kind: 'checkbox', text: 'Checkbox' }, 'Checkbox'));
}

export function textFieldTemplate(): Template {
  return singleton({ ...defaultNode({ kind: 'textField', text: 'Label' }, 'Text Field'), width: fill });
}

export function textFieldMultilineTemplate(): Template {
  return singleton({ ...defaultNode({ kind: 'textFieldMultiline', text: 'Label' }, 'Multiline Field'), width: fill });
}

export function optionTemplate(text = 'Option'): Template {
  return singleton(defaultNode({ kind: 'option', text }, text));
}

export function radioTemplate(): Template {
  return tree(defaultNode({ kind: 'radio', text: 'Choose' }, 'Radio Selection'), [
    optionTemplate('Option 1'),
    optionTemplate('Option 2'),
  ]);
}

/** The insertable library, grouped the way an editor palette lists it. */
export const templates: readonly TemplateGroup[] = [
  { label: 'Layout', items: [rowTemplate(), columnTemplate(), textColumnTemplate()] },
  {
    label: 'Content',
    items: [headingTemplate(1), headingTemplate(2), headingTemplate(3), paragraphTemplate(), textTemplate(), imageTemplate()],
  },
  {
    label: 'Form Controls',
    items: [
      buttonTemplate(),
      checkboxTemplate(),
      textFieldTemplate(),
      textFieldMultilineTemplate(),
      radioTemplate(),
      optionTemplate(),
    ],
  },
];

export function instantiate(template: Template, seed: Seed): [Tree<DesignNode>, Seed] {
  return cloneWithFreshIds(template, seed);
}
