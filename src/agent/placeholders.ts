export type PlaceholderShape = "angle_token" | "step_reference" | "template_variable";

export interface PlaceholderMatch {
  shape: PlaceholderShape;
  token: string;
}

// Angle tokens are bare identifiers such as <file> or <branch name>. They must not
// follow a word character (Array<string>) or another "<" (heredoc <<EOF), and
// carry no attributes or slashes, so markup like <a href="x"> or </b> is left alone.
const PLACEHOLDER_PATTERNS: ReadonlyArray<{ pattern: RegExp; shape: PlaceholderShape }> = [
  {
    pattern: /(?<![\w<])<[A-Za-z_][\w-]*(?: [A-Za-z_][\w-]*){0,3}>(?!>)/gu,
    shape: "angle_token",
  },
  {
    pattern: /\$(?:output|outputs|result|results|step|steps)\[[^\]\r\n]*\]/giu,
    shape: "step_reference",
  },
  {
    pattern: /\{\{\s*[\w.-]+\s*\}\}/gu,
    shape: "template_variable",
  },
];

function isClosedMarkupElement(value: string, token: string): boolean {
  const elementName = token.slice(1, -1).split(" ")[0];
  return elementName !== undefined && value.includes(`</${elementName}>`);
}

export function findPlaceholders(value: string): PlaceholderMatch[] {
  const matches: Array<PlaceholderMatch & { offset: number }> = [];

  for (const { pattern, shape } of PLACEHOLDER_PATTERNS) {
    for (const match of value.matchAll(pattern)) {
      const token = match[0];
      if (shape === "angle_token" && isClosedMarkupElement(value, token)) {
        continue;
      }
      matches.push({ offset: match.index ?? 0, shape, token });
    }
  }

  return matches
    .sort((left, right) => left.offset - right.offset)
    .map(({ shape, token }) => ({ shape, token }));
}

export function containsPlaceholder(value: string): boolean {
  return findPlaceholders(value).length > 0;
}
