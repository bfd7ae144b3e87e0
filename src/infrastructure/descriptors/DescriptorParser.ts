/**
 * @extensor/core - Descriptor Parser
 *
 * Parses the line-oriented text of one descriptor resource:
 *
 * ```
 * # comment
 * python = langs.PythonLanguage
 * ruby=langs.RubyLanguage   # trailing comment
 * langs.GoLanguage           # bound under its own type name
 * ```
 */

/**
 * A `name = typeReference` binding read from one line
 */
export interface DescriptorEntry {
  readonly name: string;
  readonly typeReference: string;
  /** 1-based line number */
  readonly line: number;
}

/**
 * A line that could not be read as a binding
 */
export interface MalformedLine {
  readonly line: number;
  readonly text: string;
  readonly reason: string;
}

export interface ParsedDescriptor {
  readonly entries: DescriptorEntry[];
  readonly malformed: MalformedLine[];
}

/**
 * Parse a descriptor's text.
 *
 * A line without `=` binds the type reference under its own text.
 */
export function parseDescriptor(text: string): ParsedDescriptor {
  const entries: DescriptorEntry[] = [];
  const malformed: MalformedLine[] = [];

  text.split(/\r?\n/).forEach((raw, index) => {
    const line = index + 1;
    const commentAt = raw.indexOf('#');
    const content = (commentAt >= 0 ? raw.substring(0, commentAt) : raw).trim();
    if (content.length === 0) return;

    const separatorAt = content.indexOf('=');
    if (separatorAt < 0) {
      entries.push({ name: content, typeReference: content, line });
      return;
    }

    const name = content.substring(0, separatorAt).trim();
    const typeReference = content.substring(separatorAt + 1).trim();
    if (name.length === 0) {
      malformed.push({ line, text: raw, reason: 'missing extension name' });
    } else if (typeReference.length === 0) {
      malformed.push({ line, text: raw, reason: 'missing type reference' });
    } else {
      entries.push({ name, typeReference, line });
    }
  });

  return { entries, malformed };
}
