/**
 * Shell-style file name patterns over one path segment, case-sensitive.
 * A name that starts with `.` only matches a pattern that starts with a
 * literal `.`.
 */

const REGEX_SPECIALS = /[.*+?^${}()|[\]\\/]/g;

function escapeRegex(s: string): string {
  return s.replaceAll(REGEX_SPECIALS, "\\$&");
}

function classMember(ch: string): string {
  return /[\\\]^[-]/.test(ch) ? `\\${ch}` : ch;
}

function translateClass(body: string): string {
  let chars = [...body];
  const negate = chars[0] === "!" || chars[0] === "^";
  if (negate) chars = chars.slice(1);

  let members = "";
  for (let i = 0; i < chars.length; i++) {
    const start = chars[i] ?? "";
    const end = chars[i + 2];
    if (chars[i + 1] !== "-" || end === undefined) {
      members += classMember(start);
      continue;
    }
    // A reversed range such as [9-0] matches nothing.
    if ((start.codePointAt(0) ?? 0) <= (end.codePointAt(0) ?? 0)) {
      members += `${classMember(start)}-${classMember(end)}`;
    }
    i += 2;
  }
  return `[${negate ? "^" : ""}${members}]`;
}

export function globToRegExp(pattern: string): RegExp {
  let out = "";
  let i = 0;
  while (i < pattern.length) {
    const c = pattern[i];
    i++;
    if (c === "*") {
      out += ".*";
    } else if (c === "?") {
      out += ".";
    } else if (c === "[") {
      let j = i;
      if (pattern[j] === "!" || pattern[j] === "^") j++;
      // A `]` directly after the opening bracket is part of the class.
      if (pattern[j] === "]") j++;
      while (j < pattern.length && pattern[j] !== "]") j++;
      if (j >= pattern.length) {
        out += "\\[";
      } else {
        out += translateClass(pattern.slice(i, j));
        i = j + 1;
      }
    } else {
      out += escapeRegex(c ?? "");
    }
  }
  return new RegExp(`^${out}$`, "su");
}

export function escapeGlob(literal: string): string {
  return literal.replaceAll(/[*?[]/g, "[$&]");
}

export type GlobMatcher = (name: string) => boolean;

export function compileGlobs(patterns: readonly string[]): GlobMatcher {
  const compiled = patterns.map((p) => ({
    dotLiteral: p.startsWith("."),
    regex: globToRegExp(p),
  }));
  return (name) =>
    compiled.some(
      (c) => (c.dotLiteral || !name.startsWith(".")) && c.regex.test(name)
    );
}

export function matchesGlob(name: string, pattern: string): boolean {
  return compileGlobs([pattern])(name);
}
