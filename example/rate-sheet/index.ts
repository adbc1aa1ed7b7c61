/**
 * Rate Sheet Example
 *
 * Reads a payin grid image with a vision model and prices every row against
 * a decision table kept in JSON.
 *
 * Run with: PAYOUT_LLM_API_KEY=your_key npx tsx example/rate-sheet/index.ts ./grid.png "Digit"
 */

import 'dotenv/config';

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';

import {
  configFromEnv,
  isBatchFault,
  payoutEngine,
  toDisplayRow,
} from '../../src/index.js';

const here = path.dirname(fileURLToPath(import.meta.url));

async function main() {
  const [filePath, companyName = ''] = process.argv.slice(2);
  if (!filePath) {
    console.error('Usage: index.ts <image> [company]');
    process.exit(1);
  }

  const config = configFromEnv(process.env);
  const table = payoutEngine.table(config.decisionTablePath ?? path.join(here, 'table.json'));

  console.log('📄 Rate Sheet Payouts\n');
  console.log(`File: ${filePath}`);
  console.log(`Company: ${companyName || '(none)'}`);
  console.log(`Rules: ${table.rules.length}\n`);

  const result = await payoutEngine.run({
    companyName,
    input: {
      file: fs.readFileSync(filePath),
      filename: path.basename(filePath),
      contentType: '',
    },
    extractor: payoutEngine.vision({
      provider: config.provider,
      apiKey: config.apiKey,
      table,
    }),
    table,
    logLevel: config.logLevel,
    storeLogs: true,
  });

  console.table(result.records.map(toDisplayRow));

  console.log('\n📊 Summary');
  console.log(`   Records: ${result.summary.totalRecords}`);
  console.log(`   Average payin: ${result.summary.avgPayin}%`);
  console.log(`   Segments: ${result.summary.uniqueSegments}`);
  for (const [formula, count] of Object.entries(result.summary.formulaSummary)) {
    console.log(`   ${formula}: ${count}`);
  }
  if (result.logFolder) {
    console.log(`\n   Logs: ${result.logFolder}`);
  }
}

main().catch((error: unknown) => {
  if (isBatchFault(error)) {
    console.error(`❌ ${error.code}: ${error.message}`);
  } else {
    console.error(error);
  }
  process.exit(1);
});
