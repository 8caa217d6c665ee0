import { existsSync } from "node:fs";
import dotenv from "dotenv";
import { loadConfig } from "../lib/food-safety/config";
import {
  checkConnectivity,
  checkDependencies,
  checkEnvironment,
  checkImageProcessing,
  runChecks,
} from "../lib/food-safety/diagnostics";

async function main() {
  const envFileExists = existsSync(".env");
  dotenv.config();
  const config = loadConfig();

  console.log("🍎 Food Safety Analyzer - Setup Check");
  console.log("=".repeat(40));

  const report = await runChecks([
    ["environment", () => checkEnvironment({ apiKey: config.apiKey, envFileExists })],
    ["dependencies", () => checkDependencies()],
    ["connectivity", () => checkConnectivity(config)],
    ["image processing", () => checkImageProcessing()],
  ]);

  for (const r of report.results) {
    console.log(`${r.passed ? "✅" : "❌"} ${r.name}: ${r.detail}`);
    for (const w of r.warnings) console.log(`   ⚠️  ${w}`);
  }

  console.log("=".repeat(40));
  if (report.ok) {
    console.log(`✅ All checks passed! (${report.passed}/${report.total})`);
    console.log("🚀 You're ready to run the app: npm run dev");
  } else {
    console.log(`❌ Some checks failed: ${report.passed}/${report.total} passed`);
    console.log("🔧 Please fix the issues above before running the app.");
  }

  process.exitCode = report.ok ? 0 : 1;
}

main().catch((err) => {
  console.error("CHECK ERROR:", err);
  process.exitCode = 1;
});
