// src/lib/slug.ts
export function slugify(s: string) {
  return s.toLowerCase().trim()
    .replace(/[^\p{Letter}\p{Number}]+/gu, "-")
    .replace(/^-+|-+$/g, "");
}

// 2019-06-15-zend-test-doubles.md -> zend-test-doubles
export function slugFromPath(fp: string) {
  const file = fp.split(/[\\/]/).pop() ?? fp;
  const name = file.replace(/\.[^.]+$/, "");
  return slugify(name.replace(/^\d{4}-\d{2}-\d{2}-/, ""));
}
