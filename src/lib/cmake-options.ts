export type CmakeValue = string | boolean;

/** Cache definitions in the order they are passed to cmake */
export type CmakeOptions = Record<string, CmakeValue>;

export function toCmakeBoolean(value: boolean): 'TRUE' | 'FALSE' {
  return value ? 'TRUE' : 'FALSE';
}

export function renderCmakeDefinitions(options: CmakeOptions): string[] {
  return Object.entries(options).map(([name, value]) =>
    `-D${name}=${typeof value === 'boolean' ? toCmakeBoolean(value) : value}`
  );
}
