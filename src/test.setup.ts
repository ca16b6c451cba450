// Shared test setup for Vitest
// Tell React the jsdom environment wraps updates in act()
// See: https://react.dev/reference/react/act
Object.assign(globalThis, { IS_REACT_ACT_ENVIRONMENT: true });
