// src/lib/posts.ts
// Read, validate and list blog posts. Front matter is split off with
// gray-matter and checked against the zod schema in content.config.ts.
import { readFile } from "node:fs/promises";
import { join } from "node:path";
import matter from "gray-matter";
import { globby } from "globby";
import { CORE_SCHEMA, load } from "js-yaml";
import type { ZodIssue } from "zod";
import { PostFrontmatter } from "../content.config";
import type { ListOptions, ParseOptions, Post, PostWarning } from "../types";
import { MalformedMetadataError } from "./errors";
import { slugFromPath, slugify } from "./slug";

export const POST_GLOB = "**/*.{md,mdx,markdown}";
export const DEFAULT_CONTENT_DIR = "src/content/posts";

// Core schema: timestamps and yes/no stay strings so the zod schema sees
// what was written. Passing options also keeps gray-matter from caching
// every input it has seen.
function parseYaml(input: string): object {
  const data = load(input, { schema: CORE_SCHEMA });
  return typeof data === "object" && data !== null ? data : {};
}

const MATTER_OPTIONS = { engines: { yaml: parseYaml } };

function describeIssue(issue: ZodIssue) {
  const path = issue.path.join(".");
  return path ? `${path}: ${issue.message}` : issue.message;
}

// blank lines after the closing delimiter and trailing whitespace are not part of the body
function cleanBody(content: string) {
  return content.replace(/^(?:[ \t]*\r?\n)+/, "").trimEnd();
}

export function parsePost(raw: string, options: ParseOptions = {}): Post {
  const { source } = options;
  if (!matter.test(raw)) {
    throw new MalformedMetadataError(["missing front-matter block"], source);
  }

  let file: matter.GrayMatterFile<string>;
  try {
    file = matter(raw, MATTER_OPTIONS);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new MalformedMetadataError([`invalid YAML: ${reason}`], source, { cause: e });
  }

  const result = PostFrontmatter.safeParse(file.data);
  if (!result.success) {
    throw new MalformedMetadataError(result.error.issues.map(describeIssue), source);
  }
  const front = result.data;

  const categories = [...front.categories];
  const extra = front.category;
  if (extra && !categories.some((c) => c.toLowerCase() === extra.toLowerCase())) {
    categories.push(extra);
  }

  const slug = front.slug
    ? slugify(front.slug)
    : (source ? slugFromPath(source) : "") || slugify(front.title);

  const post: Post = {
    title: front.title,
    date: front.date,
    categories,
    tags: front.tags,
    slug,
    draft: front.draft === true || front.published === false,
    body: cleanBody(file.content),
  };
  if (front.description !== undefined) post.description = front.description;
  if (source !== undefined) post.source = source;
  return post;
}

export function renderPost(post: Post): string {
  const data: Record<string, unknown> = {
    title: post.title,
    date: post.date,
  };
  if (post.categories.length) data.categories = post.categories;
  if (post.tags.length) data.tags = post.tags;
  data.slug = post.slug;
  if (post.description !== undefined) data.description = post.description;
  if (post.draft) data.draft = true;
  return matter.stringify({ content: post.body }, data);
}

export function lintPost(post: Post): PostWarning[] {
  const warnings: PostWarning[] = [];
  if (!post.body.trim()) {
    warnings.push({
      kind: "empty-body",
      source: post.source,
      message: `${post.source ?? post.slug}: post has front matter but no body`,
    });
  }
  return warnings;
}

/** newest first; posts with the same date keep their relative order */
export function sortPosts(posts: readonly Post[]): Post[] {
  return [...posts].sort((a, b) => b.date.getTime() - a.date.getTime());
}

export async function listPosts(options: ListOptions = {}): Promise<Post[]> {
  const dir = options.dir ?? DEFAULT_CONTENT_DIR;
  const onWarning = options.onWarning ?? ((w: PostWarning) => console.warn(`⚠️  ${w.message}`));

  // globby gives no ordering guarantee
  const files = (await globby([POST_GLOB], { cwd: dir })).sort();

  const posts: Post[] = [];
  for (const rel of files) {
    const fp = join(dir, rel);
    const raw = await readFile(fp, "utf8");
    const post = parsePost(raw, { source: fp });
    lintPost(post).forEach(onWarning);
    if (post.draft && !options.includeDrafts) continue;
    posts.push(post);
  }
  return sortPosts(posts);
}

export function postsInCategory(posts: readonly Post[], category: string): Post[] {
  const wanted = category.toLowerCase();
  return posts.filter((p) => p.categories.some((c) => c.toLowerCase() === wanted));
}

export function groupByCategory(posts: readonly Post[]): Map<string, Post[]> {
  const names = new Map<string, string>();
  const groups = new Map<string, Post[]>();
  for (const post of posts) {
    for (const c of post.categories) {
      const key = c.toLowerCase();
      let name = names.get(key);
      if (name === undefined) {
        name = c;
        names.set(key, c);
        groups.set(c, []);
      }
      const group = groups.get(name);
      if (group && !group.includes(post)) group.push(post);
    }
  }
  return groups;
}

export function getPostBySlug(posts: readonly Post[], slug: string): Post | undefined {
  return posts.find((p) => p.slug === slug);
}
