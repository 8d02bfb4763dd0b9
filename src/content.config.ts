// src/content.config.ts
import { z } from "zod";

// 2019-06-15, 2019-06-15 10:00:00 +0200, 2019-06-15T10:00:00.000Z, ...
const TIMESTAMP =
  /^(\d{4})-(\d{1,2})-(\d{1,2})(?:(?:[Tt]|\s+)(\d{1,2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?\s*(Z|[+-]\d{1,2}(?::?\d{2})?)?)?$/;

function offsetMinutes(tz: string | undefined) {
  if (!tz || tz === "Z") return 0;
  const sign = tz.startsWith("-") ? -1 : 1;
  const digits = tz.slice(1).replace(":", "");
  const hours = Number(digits.length > 2 ? digits.slice(0, -2) : digits);
  const minutes = digits.length > 2 ? Number(digits.slice(-2)) : 0;
  return sign * (hours * 60 + minutes);
}

/**
 * Reads a written timestamp. No offset means UTC, the same as an unquoted
 * YAML timestamp. Calendar dates that do not exist (2019-02-30) are rejected
 * instead of rolling over.
 */
export function parseTimestamp(text: string): Date | undefined {
  const m = TIMESTAMP.exec(text.trim());
  if (!m) return undefined;
  const [, y, mo, d, hh = "0", mi = "0", ss = "0", frac = "0", tz] = m;
  const year = Number(y);
  const month = Number(mo) - 1;
  const day = Number(d);

  const date = new Date(0);
  date.setUTCFullYear(year, month, day);
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month || date.getUTCDate() !== day) {
    return undefined;
  }

  const hours = Number(hh);
  const minutes = Number(mi);
  const seconds = Number(ss);
  if (hours > 23 || minutes > 59 || seconds > 59) return undefined;
  const offset = offsetMinutes(tz);
  if (Math.abs(offset) > 14 * 60) return undefined;

  date.setUTCHours(hours, minutes, seconds, Number(frac.padEnd(3, "0").slice(0, 3)));
  return new Date(date.getTime() - offset * 60_000);
}

const Timestamp = z.unknown().transform((value, ctx) => {
  if (value == null || value === "") {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Required" });
    return z.NEVER;
  }
  const date =
    value instanceof Date ? value : typeof value === "string" ? parseTimestamp(value) : undefined;
  if (!date || Number.isNaN(date.getTime())) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Invalid date" });
    return z.NEVER;
  }
  return date;
});

// YAML reads `title: 1984` as a number
const scalarText = (v: unknown) => (typeof v === "number" ? String(v) : v);

/** empty keys (`description:`) count as absent */
const OptionalText = z.preprocess((v) => {
  const s = scalarText(v);
  if (s == null || (typeof s === "string" && !s.trim())) return undefined;
  return s;
}, z.string().trim().optional());

const Flag = z.preprocess((v) => {
  if (v == null) return undefined;
  if (v === "true") return true;
  if (v === "false") return false;
  return v;
}, z.boolean().optional());

/** list or space-separated string; duplicates dropped, first one kept */
const Terms = z
  .union([z.array(z.union([z.string(), z.number()])), z.string(), z.null()])
  .optional()
  .transform((raw) => {
    if (raw == null) return [];
    const items = typeof raw === "string" ? raw.split(/\s+/) : raw.map(String);
    const seen = new Set<string>();
    const out: string[] = [];
    for (const item of items) {
      const term = item.trim();
      if (!term || seen.has(term)) continue;
      seen.add(term);
      out.push(term);
    }
    return out;
  });

export const PostFrontmatter = z.object({
  /** routing + meta */
  title: z.preprocess(scalarText, z.string().trim().min(1)),
  slug: OptionalText,
  description: OptionalText,

  /** dates (accept string or Date) */
  date: Timestamp,

  /** taxonomy */
  categories: Terms,
  category: OptionalText,
  tags: Terms,

  /** publishing */
  draft: Flag,
  published: Flag,
});
