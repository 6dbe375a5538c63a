/**
 * Replay Command
 *
 * Recovers comments that left the live path: dead letters, or anything in the
 * audit log after a cursor (e.g. entries whose queue TTL expired).
 *
 * Usage:
 *   npm run replay -- dead-letters --limit 100
 *   npm run replay -- audit-log --from 1733572800000-0 --limit 500
 *   npm run replay -- dead-letters --dry-run
 */

import { validateEnv } from '../config/env.js';
import { logger } from '../config/logger.js';
import { createRuntime } from '../bootstrap.js';
import { ReplayService } from '../services/replay.service.js';

export interface ReplayArgs {
  target: 'dead-letters' | 'audit-log';
  from: string | null;
  limit: number;
  dryRun: boolean;
}

export function parseReplayArgs(argv: string[]): ReplayArgs {
  const [target] = argv;
  if (target !== 'dead-letters' && target !== 'audit-log') {
    throw new Error('First argument must be "dead-letters" or "audit-log"');
  }

  const valueOf = (flag: string): string | undefined => {
    const index = argv.indexOf(flag);
    return index >= 0 ? argv[index + 1] : undefined;
  };

  const limitArg = valueOf('--limit');
  const limit = limitArg ? parseInt(limitArg, 10) : 100;
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new Error(`Invalid --limit: ${limitArg}`);
  }

  const from = valueOf('--from') ?? null;
  if (from !== null && !/^\d+-\d+$/.test(from)) {
    throw new Error(`Invalid --from cursor: ${from}`);
  }

  return { target, from, limit, dryRun: argv.includes('--dry-run') };
}

async function main() {
  const args = parseReplayArgs(process.argv.slice(2));

  console.log('='.repeat(60));
  console.log(`REPLAY ${args.target.toUpperCase()}`);
  console.log('='.repeat(60));
  if (args.dryRun) {
    console.log('DRY RUN MODE - No changes will be made');
  }

  const env = validateEnv();
  const runtime = await createRuntime(env);
  const replay = new ReplayService(runtime.deadLetters, runtime.auditLog, runtime.queue, runtime.orchestrator);

  try {
    if (args.target === 'dead-letters') {
      const summary = await replay.replayDeadLetters({ limit: args.limit, dryRun: args.dryRun });
      console.log(`\nReplayed ${summary.replayed} dead letters`);
      for (const [stage, count] of Object.entries(summary.outcomes)) {
        console.log(`  ${stage}: ${count}`);
      }
    } else {
      const summary = await replay.replayAuditLog(args.from, { limit: args.limit, dryRun: args.dryRun });
      console.log(`\nRequeued ${summary.requeued} comments`);
      if (summary.lastLogId) {
        console.log(`Continue with: --from ${summary.lastLogId}`);
      }
    }
  } finally {
    await runtime.close();
  }
}

if (require.main === module) {
  main().catch((error) => {
    logger.error('Replay failed', { error: error instanceof Error ? error.message : String(error) });
    process.exit(1);
  });
}
