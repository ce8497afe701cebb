import 'dotenv/config';
import { loadConfig } from '../src/config';
import { Database } from '../src/data/database';
import { createProviderRegistry } from '../src/providers';
import { CollectionOrchestrator } from '../src/collection';
import { KOREA_SCOPES, usScope } from '../src/scheduler';
import type { CollectionScope, RunSummary } from '../src/types';
import { describeIssues, logger, runBatchOptionsSchema } from '../src/utils';

// Usage: npm run collect -- --scope korea|kospi|kosdaq|us [--full] [--max 50] [--entities prices,statements]
//   [--report-types annual,Q1,Q2,Q3]
function parseArgs(argv: string[]): Record<string, unknown> {
  const args: Record<string, unknown> = {};
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--full') {
      args.incremental = false;
    } else if (arg === '--scope') {
      args.scope = argv[++i];
    } else if (arg === '--max') {
      args.maxTickers = argv[++i];
    } else if (arg === '--entities') {
      args.entities = (argv[++i] ?? '').split(',').filter((e) => e.length > 0);
    } else if (arg === '--report-types') {
      args.reportTypes = (argv[++i] ?? '').split(',').filter((r) => r.length > 0);
    }
  }
  return args;
}

function scopesFor(name: string, usTickers: string[]): CollectionScope[] {
  if (name === 'korea') return KOREA_SCOPES;
  if (name === 'us') return [usScope(usTickers)];
  return KOREA_SCOPES.filter((s) => s.name === name);
}

async function main() {
  const parsed = runBatchOptionsSchema.safeParse(parseArgs(process.argv.slice(2)));
  if (!parsed.success) {
    console.error('Invalid arguments:', describeIssues(parsed.error));
    process.exit(1);
  }
  const options = parsed.data;

  const config = loadConfig();
  const scopes = scopesFor(options.scope, config.collection.usTickers);
  if (scopes.length === 0) {
    console.error(`Unknown scope: ${options.scope} (expected korea, kospi, kosdaq or us)`);
    process.exit(1);
  }

  const db = new Database(config.database.url);
  const orchestrator = new CollectionOrchestrator(db, createProviderRegistry(config.providers), {
    concurrency: config.collection.workerPoolSize,
    defaultWindowDays: config.collection.defaultWindowDays,
    statementStartYear: config.collection.statementStartYear,
  });

  const summaries: RunSummary[] = [];
  try {
    await db.connect();
    for (const scope of scopes) {
      logger.setCorrelationId(`cli-${scope.name}`);
      summaries.push(
        await orchestrator.runBatch(scope, {
          incremental: options.incremental,
          maxTickers: options.maxTickers,
          entities: options.entities,
          reportTypes: options.reportTypes,
          deadlineMs: config.collection.runDeadlineMs,
        })
      );
      logger.clearCorrelationId();
    }
  } finally {
    await db.disconnect();
  }

  for (const s of summaries) {
    console.log(`\n[${s.scope}] ${s.runId}`);
    console.log(`  tickers: ${s.totalTickers} (ok ${s.succeeded}, skipped ${s.skipped}, failed ${s.failed}, not attempted ${s.notAttempted})`);
    console.log(`  written: prices ${s.pricesWritten}, snapshots ${s.snapshotsWritten}, statements ${s.statementsWritten}`);
    for (const f of s.failures.slice(0, 20)) {
      console.log(`  ! ${f.symbol} ${f.entity}: ${f.reason} ${f.message}`);
    }
    for (const p of s.providerFailures) {
      console.log(`  !! provider ${p.provider} (${p.capability}): ${p.reason} ${p.message}`);
    }
  }
}

main().catch((error: unknown) => {
  console.error('Error:', error);
  process.exit(1);
});
