/**
 * Remove uploaded files that no submission references any more.
 *
 * Orphans appear when a process dies between writing an upload and
 * committing its submission, or when a cascade delete could not remove a
 * file. Run with: npm run prune-artifacts [-- --dry-run]
 */

import { loadConfig } from "../config";
import { openStores, Stores } from "../stores";
import { ArtifactStorage, LocalArtifactStorage } from "../storage/artifactStorage";

export interface PruneResult {
  scanned: number;
  orphans: string[];
  removed: number;
}

export async function pruneOrphanArtifacts(
  stores: Stores,
  storage: ArtifactStorage,
  dryRun = false
): Promise<PruneResult> {
  const referenced = stores.submissions.getAllArtifactReferences();
  const stored = await storage.list();
  const orphans = stored.filter((reference) => !referenced.has(reference));

  let removed = 0;
  if (!dryRun) {
    for (const reference of orphans) {
      if (await storage.remove(reference)) {
        removed++;
      }
    }
  }

  return { scanned: stored.length, orphans, removed };
}

async function main(): Promise<void> {
  const config = loadConfig();
  const dryRun = process.argv.includes("--dry-run");
  const result = await pruneOrphanArtifacts(
    openStores(config.dataDir),
    new LocalArtifactStorage(config.uploadDir),
    dryRun
  );

  console.log(`Scanned ${result.scanned} files in ${config.uploadDir}`);
  for (const reference of result.orphans) {
    console.log(`  ${dryRun ? "would remove" : "removed"} ${reference}`);
  }
  console.log(dryRun ? `${result.orphans.length} orphaned` : `${result.removed} removed`);
}

if (require.main === module) {
  main().catch((error) => {
    console.error("Prune failed:", error);
    process.exit(1);
  });
}
