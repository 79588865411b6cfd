const GLOB_CHARS = /[*?]/u;

export function isGlobPattern(value: string): boolean {
  return GLOB_CHARS.test(value);
}

export function normalizeRelativePattern(value: string): string {
  return value
    .trim()
    .replaceAll("\\", "/")
    .replace(/^\.\/+/u, "")
    .replace(/\/+$/u, "");
}

function globToRegExpSource(pattern: string): string {
  let source = "";
  for (let index = 0; index < pattern.length; index += 1) {
    const char = pattern[index];
    if (char === "*") {
      if (pattern[index + 1] === "*") {
        if (pattern[index + 2] === "/") {
          source += "(?:.*/)?";
          index += 2;
        } else {
          source += ".*";
          index += 1;
        }
      } else {
        source += "[^/]*";
      }
      continue;
    }

    if (char === "?") {
      source += "[^/]";
      continue;
    }

    if ("\\^$+.()|{}[]/".includes(char)) {
      source += `\\${char}`;
      continue;
    }

    source += char;
  }
  return source;
}

/**
 * Compiles a path glob. `*` and `?` stay within one segment, `**` spans
 * directories. Matching is anchored on both ends.
 */
export function compileGlob(pattern: string): RegExp {
  return new RegExp(`^${globToRegExpSource(normalizeRelativePattern(pattern))}$`, "u");
}
