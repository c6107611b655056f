// Minimal frontmatter reader for Mermaid-style YAML blocks.
// Only the `config.pie` section is read, without pulling in a full YAML parser.

export type FrontmatterValue = string | number | boolean;

export interface FrontmatterEntry {
  key: string;
  value: FrontmatterValue;
  /** 1-based line in the original text */
  line: number;
}

export interface Frontmatter {
  raw: string;
  body: string;
  /** Number of lines before the body starts */
  bodyLineOffset: number;
  pie: FrontmatterEntry[];
}

export function parseFrontmatter(input: string): Frontmatter | null {
  const text = input.startsWith('\ufeff') ? input.slice(1) : input; // strip BOM
  const lines = text.split(/\r?\n/);
  if (lines.length < 3 || lines[0].trim() !== '---') return null;

  let i = 1;
  while (i < lines.length && lines[i].trim() !== '---') i++;
  if (i >= lines.length) return null; // no closing '---'

  const block = lines.slice(1, i);
  const pie: FrontmatterEntry[] = [];
  let ctx: 'root' | 'config' | 'config.pie' = 'root';

  block.forEach((line, idx) => {
    if (!line.trim() || line.trim().startsWith('#')) return;
    const indent = line.match(/^\s*/)?.[0].length ?? 0;
    const mKey = line.match(/^\s*([A-Za-z0-9_-]+):\s*(.*)$/);
    if (!mKey) return;
    const key = mKey[1];

    if (indent === 0) {
      ctx = key === 'config' ? 'config' : 'root';
      return;
    }
    if (ctx === 'root') return;
    if (ctx === 'config.pie' && indent >= 4) {
      pie.push({ key, value: scalar(mKey[2] ?? ''), line: idx + 2 });
      return;
    }
    // Any config-level key; only `pie` opens a section we read
    ctx = key === 'pie' ? 'config.pie' : 'config';
  });

  return { raw: block.join('\n'), body: lines.slice(i + 1).join('\n'), bodyLineOffset: i + 1, pie };
}

function unquote(val: string): string {
  const v = val.trim();
  if (v.length >= 2 && ((v.startsWith('"') && v.endsWith('"')) || (v.startsWith("'") && v.endsWith("'")))) {
    return v.slice(1, -1);
  }
  return v;
}

function scalar(rawValue: string): FrontmatterValue {
  const v = unquote(rawValue.replace(/\s+#.*$/, ''));
  if (/^-?[0-9]+(\.[0-9]+)?$/.test(v)) return Number(v);
  if (/^(true|false)$/i.test(v)) return /^true$/i.test(v);
  return v;
}
