/**
 * Template lint CLI
 * Usage: npm run lint:templates [-- <templates dir>]
 *
 * Exits 1 when any template fails to parse, validate, match its file name or
 * keep its declared structure once rendered.
 */

import { countLintCodes, formatLintResults, lintAllTemplates } from "./lintTemplates";

const results = lintAllTemplates(process.argv[2]);
console.log(formatLintResults(results));

const invalid = results.filter(r => !r.valid);
const codes = countLintCodes(results);

console.log("\n" + "=".repeat(50));
console.log(`[TemplateLint] ${results.length} templates, ${invalid.length} invalid`);
for (const [code, count] of codes) {
  console.log(`  ${code}: ${count}`);
}

if (invalid.length > 0) {
  console.log(`[TemplateLint] FAIL: ${invalid.map(r => r.templateId).join(", ")}`);
  process.exit(1);
}
console.log("[TemplateLint] PASS: shapes intact, placeholders well-formed");
