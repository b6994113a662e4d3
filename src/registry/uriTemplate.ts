export type UriVariables = Record<string, string>;

export interface UriTemplateMatcher {
  readonly template: string;
  readonly variables: string[];
  match(uri: string): UriVariables | null;
}

const PLACEHOLDER = /\{([^{}]*)\}/g;
const VARIABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isUriTemplate(value: string): boolean {
  return /\{[^{}]*\}/.test(value);
}

function decode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/**
 * Compiles a level-1 URI template (`users://{user_id}/profile`) into a matcher.
 * A placeholder matches one non-empty segment without `/` or `?`.
 */
export function compileUriTemplate(template: string): UriTemplateMatcher {
  const variables: string[] = [];
  for (const [, name] of template.matchAll(PLACEHOLDER)) {
    if (!VARIABLE_NAME.test(name)) {
      throw new Error(
        `Invalid variable '{${name}}' in URI template '${template}'`
      );
    }
    if (variables.includes(name)) {
      throw new Error(
        `Variable '${name}' appears twice in URI template '${template}'`
      );
    }
    variables.push(name);
  }

  // Escape everything, then turn the escaped placeholders into named groups
  const pattern = template
    .replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
    .replace(/\\\{([^{}\\]+)\\\}/g, "(?<$1>[^/?]+)");
  const regex = new RegExp(`^${pattern}$`);

  return {
    template,
    variables,
    match(uri: string): UriVariables | null {
      const result = regex.exec(uri);
      if (!result) {
        return null;
      }
      const vars: UriVariables = {};
      for (const name of variables) {
        const value = result.groups?.[name];
        if (value !== undefined) {
          vars[name] = decode(value);
        }
      }
      return vars;
    },
  };
}

/**
 * Scheme part of a URI or template, without the colon. Empty when there is none.
 */
export function schemeOf(uri: string): string {
  const index = uri.indexOf(":");
  return index > 0 ? uri.slice(0, index) : "";
}
