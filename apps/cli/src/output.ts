export const stringifyOutput = (value: unknown): string =>
  JSON.stringify(value, undefined, 2);
