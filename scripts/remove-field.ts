// scripts/remove-field.ts
// Drops one front-matter key from every post; the body is never touched.
// FIELD=layout (default)
// DRY=1  => preview (default)
// DRY=0  => execute
import { readFile, writeFile } from "node:fs/promises";
import glob from "fast-glob";
import { loadConfig } from "../src/config";
import { removeField } from "../src/lib/frontmatter";
import { POST_GLOB } from "../src/lib/posts";

async function run() {
  const { contentDir, dry, field } = loadConfig();
  const files = (await glob(`${contentDir}/${POST_GLOB}`)).sort();

  let changed = 0;
  for (const file of files) {
    const text = await readFile(file, "utf8");
    const updated = removeField(text, field);
    if (updated === undefined) continue;

    changed++;
    if (dry) {
      console.log(`[DRY] would remove ${field} from: ${file}`);
    } else {
      await writeFile(file, updated, "utf8");
      console.log(`✅ removed ${field} field from: ${file}`);
    }
  }

  if (!changed) console.log(`No post has a "${field}" field.`);
  console.log(dry ? "\nDry-run complete. Run with DRY=0 to execute."
                  : `\n✨ Done. ${changed} file(s) updated.\n`);
}

run().catch(e => { console.error(e); process.exit(1); });
