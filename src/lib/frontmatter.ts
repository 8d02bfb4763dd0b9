// src/lib/frontmatter.ts
// Line-level edits inside the front-matter block. Everything outside the
// edited key is written back byte for byte.

const escape = (s: string) => s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/** index of the closing `---`, or -1 when the text has no front-matter block */
function closingLine(lines: string[]) {
  if (lines[0]?.trimEnd() !== "---") return -1;
  for (let i = 1; i < lines.length; i++) {
    if (lines[i].trimEnd() === "---") return i;
  }
  return -1;
}

export function removeField(raw: string, field: string): string | undefined {
  const lines = raw.split("\n");
  const close = closingLine(lines);
  if (close < 0) return undefined;

  const key = new RegExp(`^${escape(field)}\\s*:`);
  const start = lines.findIndex((line, i) => i > 0 && i < close && key.test(line));
  if (start < 0) return undefined;

  // nested values: indented lines, or `- item` list entries under the key.
  // Blank lines belong to the value only when more of it follows.
  let end = start + 1;
  for (let i = start + 1; i < close; i++) {
    const line = lines[i];
    if (!line.trim()) continue;
    if (!/^[ \t]/.test(line) && !/^-(\s|$)/.test(line)) break;
    end = i + 1;
  }

  lines.splice(start, end - start);
  return lines.join("\n");
}
