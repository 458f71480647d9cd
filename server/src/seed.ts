import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { readSampleLayouts, seedWorkbooks } from './samples.js';

// Writes the sample calculator workbooks into WORKBOOKS_DIR (`--force` overwrites).
async function main() {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  const layouts = await readSampleLayouts(config.samplesDir);
  const written = await seedWorkbooks(config.workbooksDir, layouts, process.argv.includes('--force'));
  logger.info({ dir: config.workbooksDir, written }, `seeded ${written.length} of ${layouts.size} workbook(s)`);
}

main().catch(e => {
  console.error(e instanceof Error ? e.message : e);
  process.exitCode = 1;
});
