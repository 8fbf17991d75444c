const REFERENCE = /\$\$|\$\{([A-Za-z_][A-Za-z0-9_]*)\}|\$([A-Za-z_][A-Za-z0-9_]*)/g;

/**
 * Replace `$VAR` and `${VAR}` with values from `lookup`; unknown names
 * become empty strings and `$$` is a literal dollar.
 */
export function expandVariables(
  text: string,
  lookup: (name: string) => string | undefined,
): string {
  return text.replace(REFERENCE, (match: string, braced?: string, bare?: string) => {
    if (match === "$$") return "$";
    return lookup(braced ?? bare ?? "") ?? "";
  });
}

/**
 * Expand a variable map against itself and `outer`, in declaration order:
 * each value sees the variables declared before it, then `outer`. A value
 * naming its own variable (`PATH: $PATH:/opt/bin`) reads the outer value.
 */
export function expandVariableMap(
  vars: Readonly<Record<string, string>>,
  outer: (name: string) => string | undefined = () => undefined,
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(vars)) {
    result[key] = expandVariables(value, (name) => (name in result ? result[name] : outer(name)));
  }
  return result;
}
