/**
 * Markdown include files. A file is split into `# Module <name>` and
 * `# Package <name>` sections; a file without such headers documents the
 * module as a whole.
 *
 * @module
 */

export interface IncludeDocumentation {
  module?: string;
  packages: Map<string, string>;
}

const SECTION_HEADER = /^#\s+(Module|Package)(?:\s+(\S+))?\s*$/;

export function parseIncludes(texts: readonly string[]): IncludeDocumentation {
  const moduleParts: string[] = [];
  const packages = new Map<string, string>();

  const append = (kind: string | undefined, name: string, lines: string[]): void => {
    const body = lines.join("\n").trim();
    if (!body) return;
    if (kind === "Package") {
      const previous = packages.get(name);
      packages.set(name, previous ? `${previous}\n\n${body}` : body);
    } else {
      moduleParts.push(body);
    }
  };

  for (const text of texts) {
    let kind: string | undefined;
    let name = "";
    let lines: string[] = [];
    for (const line of text.split(/\r?\n/)) {
      const match = SECTION_HEADER.exec(line);
      if (match) {
        append(kind, name, lines);
        kind = match[1];
        name = match[2] ?? "";
        lines = [];
      } else {
        lines.push(line);
      }
    }
    append(kind, name, lines);
  }

  return { module: moduleParts.length > 0 ? moduleParts.join("\n\n") : undefined, packages };
}
