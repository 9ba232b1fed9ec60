// Lightweight Markdown helpers: titles, frontmatter tags, word counts

export interface ParsedFrontmatter {
  lines: string[];
  body: string;
}

/**
 * Split off a leading `---` frontmatter block. Returns null when the note has
 * none or the block is never closed.
 */
export function splitFrontmatter(content: string): ParsedFrontmatter | null {
  const lines = content.split('\n');
  if (lines[0]?.trim() !== '---') return null;

  for (let i = 1; i < lines.length; i++) {
    if (lines[i]?.trim() === '---') {
      return {
        lines: lines.slice(1, i),
        body: lines.slice(i + 1).join('\n'),
      };
    }
  }
  return null;
}

function unquote(value: string): string {
  const trimmed = value.trim();
  const quoted = /^(['"])(.*)\1$/.exec(trimmed);
  return quoted ? (quoted[2] ?? '') : trimmed;
}

/**
 * Tags from the frontmatter `tags` key. Handles the block list form
 * (`tags:` followed by `  - name` lines), the inline `[a, b]` form and a
 * single scalar value.
 */
export function extractFrontmatterTags(content: string): string[] {
  const frontmatter = splitFrontmatter(content);
  if (!frontmatter) return [];

  const tags: string[] = [];
  const { lines } = frontmatter;

  for (let i = 0; i < lines.length; i++) {
    const match = /^tags:\s*(.*)$/i.exec(lines[i] ?? '');
    if (!match) continue;

    const inline = (match[1] ?? '').trim();
    if (inline.startsWith('[') && inline.endsWith(']')) {
      tags.push(...inline.slice(1, -1).split(',').map(unquote));
    } else if (inline) {
      tags.push(unquote(inline));
    } else {
      for (let j = i + 1; j < lines.length; j++) {
        const item = /^\s*-\s+(.*)$/.exec(lines[j] ?? '');
        if (!item) break;
        tags.push(unquote(item[1] ?? ''));
      }
    }
    break;
  }

  return [...new Set(tags.filter((tag) => tag.length > 0))];
}

/**
 * First level-1 heading (`# Title`), skipping `##` and deeper
 */
export function extractH1Title(content: string): string | null {
  const body = splitFrontmatter(content)?.body ?? content;
  for (const line of body.split('\n')) {
    const match = /^\s*#\s+(.*\S)/.exec(line);
    if (match?.[1]) return match[1].trim();
  }
  return null;
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}
