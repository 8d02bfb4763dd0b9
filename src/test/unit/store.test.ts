import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { MalformedMetadataError } from "../../lib/errors";
import { listPosts } from "../../lib/posts";
import type { PostWarning } from "../../types";

const doc = (front: string, body = "Body text.") => `---\n${front}\n---\n\n${body}\n`;

describe("listPosts", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "posts-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function put(rel: string, text: string) {
    const fp = join(dir, rel);
    await mkdir(join(fp, ".."), { recursive: true });
    await writeFile(fp, text, "utf8");
  }

  it("lists posts newest first with ties in path order", async () => {
    await put("2020-01-01-b.md", doc("title: B\ndate: 2020-01-01"));
    await put("2020-01-01-a.md", doc("title: A\ndate: 2020-01-01"));
    await put("nested/2021-05-05-c.mdx", doc("title: C\ndate: 2021-05-05"));
    await put("notes.txt", "not a post");

    const posts = await listPosts({ dir });
    expect(posts.map((p) => p.slug)).toEqual(["c", "a", "b"]);
    expect(posts[0].source).toBe(join(dir, "nested/2021-05-05-c.mdx"));
  });

  it("returns the same sequence when run again", async () => {
    await put("one.md", doc("title: One\ndate: 2019-03-01"));
    await put("two.md", doc("title: Two\ndate: 2019-03-01"));
    await put("three.md", doc("title: Three\ndate: 2018-03-01"));

    const first = await listPosts({ dir });
    const second = await listPosts({ dir });
    expect(second).toEqual(first);
    expect(first.map((p) => p.slug)).toEqual(["one", "two", "three"]);
  });

  it("skips drafts unless asked", async () => {
    await put("live.md", doc("title: Live\ndate: 2019-03-01"));
    await put("wip.md", doc("title: WIP\ndate: 2019-04-01\ndraft: true"));

    expect((await listPosts({ dir })).map((p) => p.slug)).toEqual(["live"]);
    expect((await listPosts({ dir, includeDrafts: true })).map((p) => p.slug)).toEqual(["wip", "live"]);
  });

  it("reports empty bodies as warnings and keeps the post", async () => {
    await put("stub.md", "---\ntitle: Stub\ndate: 2019-03-01\n---\n");
    const warnings: PostWarning[] = [];

    const posts = await listPosts({ dir, onWarning: (w) => warnings.push(w) });
    expect(posts.map((p) => p.slug)).toEqual(["stub"]);
    expect(warnings).toEqual([
      {
        kind: "empty-body",
        source: join(dir, "stub.md"),
        message: `${join(dir, "stub.md")}: post has front matter but no body`,
      },
    ]);
  });

  it("warns on the console by default", async () => {
    await put("stub.md", "---\ntitle: Stub\ndate: 2019-03-01\n---\n");
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    await listPosts({ dir });
    expect(warn).toHaveBeenCalledWith(`⚠️  ${join(dir, "stub.md")}: post has front matter but no body`);
    warn.mockRestore();
  });

  it("fails on a post with malformed front matter", async () => {
    await put("good.md", doc("title: Good\ndate: 2019-03-01"));
    await put("bad.md", doc("date: 2019-03-01"));

    const err = await listPosts({ dir }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(MalformedMetadataError);
    expect(err).toMatchObject({ source: join(dir, "bad.md"), issues: ["title: Required"] });
  });

  it("reads the bundled posts", async () => {
    const posts = await listPosts({ dir: "src/content/posts" });
    expect(posts.map((p) => p.slug)).toEqual([
      "the-night-the-queue-filled-up",
      "working-from-the-kitchen-table",
      "test-doubles-in-zend-controllers",
    ]);
    expect(posts.map((p) => p.date.toISOString())).toEqual([
      "2021-11-08T06:45:00.000Z",
      "2020-04-02T16:05:00.000Z",
      "2019-06-15T07:30:00.000Z",
    ]);
    expect(posts[1].categories).toEqual(["remote-work"]);
  });
});
