// scripts/check-posts.ts
// Build-time check of the post collection: every file must parse, empty
// bodies are reported but do not fail the run.
// CONTENT_DIR=src/content/posts (default)
// INCLUDE_DRAFTS=1 => list drafts too
import { loadConfig } from "../src/config";
import { groupByCategory, listPosts } from "../src/lib/posts";
import type { PostWarning } from "../src/types";

async function run() {
  const { contentDir, includeDrafts } = loadConfig();
  const warnings: PostWarning[] = [];

  const posts = await listPosts({
    dir: contentDir,
    includeDrafts,
    onWarning: (w) => {
      warnings.push(w);
      console.warn(`⚠️  ${w.message}`);
    },
  });

  if (!posts.length) { console.log(`No posts under ${contentDir}`); return; }

  for (const p of posts) {
    const day = p.date.toISOString().slice(0, 10);
    const draft = p.draft ? " [draft]" : "";
    console.log(`${day}  ${p.slug}${draft}  (${p.categories.join(", ") || "uncategorized"})`);
  }

  console.log("");
  for (const [name, group] of groupByCategory(posts)) {
    console.log(`${name}: ${group.length}`);
  }
  console.log(`\n${posts.length} post(s), ${warnings.length} warning(s).`);
}

run().catch(e => { console.error(e); process.exit(1); });
