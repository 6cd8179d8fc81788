import { closeDb, scoringStore } from "./connection.js";
import {
  getOrCreateDefaultProfile,
  resetScoringConfiguration,
} from "../services/scoring-profiles.js";

/**
 * Install the starter scoring configuration.
 * Usage: npm run seed:scoring [-- --reset]
 */
async function seed() {
  if (process.argv.includes("--reset")) {
    console.log("  → Removing existing scoring configuration...");
    await resetScoringConfiguration(scoringStore);
  }

  const { profile, criteria, configurationIssues } =
    await getOrCreateDefaultProfile(scoringStore);

  console.log(`  ✓ Default profile: ${profile.name} (${profile.id})`);
  console.log(`  ✓ ${criteria.length} criteria, ${criteria.reduce((n, c) => n + c.rules.length, 0)} rules`);
  for (const issue of configurationIssues) {
    console.warn(`  ! ${issue}`);
  }

  await closeDb();
  console.log("\n✅ Scoring configuration ready.");
}

seed().catch((err) => {
  console.error("Seeding failed:", err);
  process.exit(1);
});
