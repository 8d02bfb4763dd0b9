// src/config.ts
// Environment for the maintenance scripts:
// CONTENT_DIR=<dir>   where posts live (default src/content/posts)
// INCLUDE_DRAFTS=1    list drafts too
// DRY=0               actually write files (anything else previews)
// FIELD=<key>         front-matter key for remove-field (default layout)
import { z } from "zod";
import { DEFAULT_CONTENT_DIR } from "./lib/posts";
import { ConfigError } from "./lib/errors";

const Env = z.object({
  CONTENT_DIR: z.string().min(1).default(DEFAULT_CONTENT_DIR),
  INCLUDE_DRAFTS: z.string().optional().transform((v) => v === "1"),
  DRY: z.string().optional().transform((v) => v !== "0"),
  FIELD: z
    .string()
    .regex(/^[A-Za-z_][\w-]*$/, "must be a plain front-matter key")
    .default("layout"),
});

export type Config = {
  contentDir: string;
  includeDrafts: boolean;
  dry: boolean;
  field: string;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = Env.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`Invalid environment: ${detail}`);
  }
  const { CONTENT_DIR, INCLUDE_DRAFTS, DRY, FIELD } = parsed.data;
  return { contentDir: CONTENT_DIR, includeDrafts: INCLUDE_DRAFTS, dry: DRY, field: FIELD };
}
