import 'dotenv/config';
import { loadConfig } from '../src/config';
import { Database } from '../src/data/database';
import { RatioCalculator } from '../src/analytics';
import { marketSchema } from '../src/utils';

// Usage: npm run ratios -- [KOSPI|KOSDAQ|NASDAQ|NYSE|AMEX] [limit]
async function main() {
  const [marketArg, limitArg] = process.argv.slice(2);
  const market = marketArg ? marketSchema.parse(marketArg.toUpperCase()) : undefined;
  const limit = limitArg ? parseInt(limitArg, 10) : undefined;

  const config = loadConfig();
  const db = new Database(config.database.url);

  try {
    await db.connect();
    const result = await new RatioCalculator(db).calculateBatch({ market, limit });

    console.log('\nRatio calculation complete:');
    console.log(`  Tickers: ${result.tickers}`);
    console.log(`  Ratios written: ${result.ratiosWritten}`);
    console.log(`  Without statements: ${result.skipped}`);
    console.log(`  Failed: ${result.failed.length}`);
    for (const f of result.failed) {
      console.log(`    ${f.symbol}: ${f.message}`);
    }
  } finally {
    await db.disconnect();
  }
}

main().catch((error: unknown) => {
  console.error('Error:', error);
  process.exit(1);
});
