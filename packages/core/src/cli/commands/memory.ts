/**
 * Memory Command — Inspect and operate a running Tiermind gateway.
 */

import { z } from 'zod';
import { ProtectedFactSchema } from '@tiermind/shared';
import type { Command, CommandContext } from '../router.js';
import { extractFlag, extractBoolFlag, formatBytes, formatTable, apiCall, errorDetail, Spinner } from '../utils.js';

const DEFAULT_URL = 'http://127.0.0.1:18790';
const PREFIX = '/api/v1/memory';

const USAGE = `
Usage: tiermind memory <subcommand> [options]

Subcommands:
  stats <user>                   Bucket counts and sizes per tier
  context <user> <query...>      Show the memory block loaded for a query
  cleanup [user]                 Run a cleanup cycle (all users when omitted)
  protect <user> <entry>         Pin an entry so cleanup never drops it
  unprotect <user> <entry>       Remove an entry's protection
  snapshots <user>               List index snapshots, newest first
  rollback <user> <generation>   Restore the index from a snapshot

Options:
  --url <url>       Server URL (default: ${DEFAULT_URL})
  --note <text>     Note stored with a protected entry (protect only)
  --json            Output raw JSON
  -h, --help        Show this help
`;

const TierStatsSchema = z.object({ buckets: z.number(), bytes: z.number() });

const StatsResponse = z.object({
  stats: z.object({
    userId: z.string(),
    tiers: z.record(TierStatsSchema),
    archivedBuckets: z.number(),
    compressedBuckets: z.number(),
    totalEntries: z.number(),
    protectedFacts: z.number(),
    highlights: z.number(),
    indexGeneration: z.number(),
    lastCleanupAt: z.number().nullable(),
    cleanupCount: z.number(),
  }),
});

const ContextResponse = z.object({
  context: z.object({
    totalTokens: z.number(),
    budgetTokens: z.number(),
    degraded: z.boolean(),
  }),
  prompt: z.string(),
});

const ReportResponse = z.object({
  report: z.object({
    weekly: z.number(),
    monthly: z.number(),
    yearly: z.number(),
    archived: z.number(),
    compressed: z.number(),
    sizeTriggered: z.array(z.string()),
    aborted: z.boolean(),
    noop: z.boolean(),
  }),
});

const RunStatsResponse = z.object({
  stats: z.object({
    processedUsers: z.number(),
    weeklySummaries: z.number(),
    monthlySummaries: z.number(),
    yearlySummaries: z.number(),
    archived: z.number(),
    compressed: z.number(),
    errors: z.array(z.object({ userId: z.string(), error: z.string() })),
  }),
});

const FactResponse = z.object({ fact: ProtectedFactSchema });

const SnapshotsResponse = z.object({
  snapshots: z.array(z.object({ generation: z.number(), updatedAt: z.number(), bytes: z.number() })),
});

const IndexResponse = z.object({ index: z.object({ generation: z.number() }) });

interface Options {
  baseUrl: string;
  json: boolean;
}

/**
 * Call the gateway and validate the reply. Failures are written to stderr
 * and come back as null.
 */
async function request<T extends z.ZodTypeAny>(
  ctx: CommandContext,
  opts: Options,
  path: string,
  schema: T,
  init: { method?: string; body?: unknown } = {}
): Promise<{ data: z.output<T>; raw: unknown } | null> {
  const result = await apiCall(opts.baseUrl, `${PREFIX}${path}`, init);
  if (!result.ok) {
    ctx.stderr.write(`Request failed: ${errorDetail(result)}\n`);
    return null;
  }
  const parsed = schema.safeParse(result.data);
  if (!parsed.success) {
    ctx.stderr.write(`Unexpected response from ${path}\n`);
    return null;
  }
  return { data: parsed.data, raw: result.data };
}

function writeJson(ctx: CommandContext, value: unknown): void {
  ctx.stdout.write(JSON.stringify(value, null, 2) + '\n');
}

function formatTime(ms: number | null): string {
  return ms === null ? 'never' : new Date(ms).toISOString();
}

function requireArgs(ctx: CommandContext, args: string[], count: number, usage: string): boolean {
  if (args.length < count) {
    ctx.stderr.write(`Usage: tiermind memory ${usage}\n`);
    return false;
  }
  return true;
}

async function runStats(ctx: CommandContext, opts: Options, userId: string): Promise<number> {
  const res = await request(ctx, opts, `/users/${encodeURIComponent(userId)}/stats`, StatsResponse);
  if (!res) return 1;
  if (opts.json) {
    writeJson(ctx, res.raw);
    return 0;
  }

  const { stats } = res.data;
  const rows = Object.entries(stats.tiers).map(([tier, t]) => ({
    tier,
    buckets: String(t.buckets),
    size: formatBytes(t.bytes),
  }));
  ctx.stdout.write(`\nMemory for ${stats.userId}\n\n`);
  ctx.stdout.write(formatTable(rows, ['tier', 'buckets', 'size']) + '\n\n');
  ctx.stdout.write(`  Entries:       ${String(stats.totalEntries)}\n`);
  ctx.stdout.write(
    `  Archived:      ${String(stats.archivedBuckets)} (${String(stats.compressedBuckets)} compressed)\n`
  );
  ctx.stdout.write(`  Protected:     ${String(stats.protectedFacts)}\n`);
  ctx.stdout.write(`  Highlights:    ${String(stats.highlights)}\n`);
  ctx.stdout.write(`  Generation:    ${String(stats.indexGeneration)}\n`);
  ctx.stdout.write(`  Last cleanup:  ${formatTime(stats.lastCleanupAt)} (${String(stats.cleanupCount)} total)\n`);
  return 0;
}

async function runContext(ctx: CommandContext, opts: Options, userId: string, query: string): Promise<number> {
  const res = await request(ctx, opts, `/users/${encodeURIComponent(userId)}/context`, ContextResponse, {
    method: 'POST',
    body: { query },
  });
  if (!res) return 1;
  if (opts.json) {
    writeJson(ctx, res.raw);
    return 0;
  }

  const { context, prompt } = res.data;
  ctx.stdout.write(prompt + '\n\n');
  ctx.stdout.write(
    `(${String(context.totalTokens)}/${String(context.budgetTokens)} tokens${context.degraded ? ', degraded' : ''})\n`
  );
  return 0;
}

async function runCleanup(ctx: CommandContext, opts: Options, userId: string | undefined): Promise<number> {
  // JSON output stays machine-readable
  const spinner = opts.json ? null : new Spinner(ctx.stdout);
  spinner?.start(userId ? `Cleaning up ${userId}...` : 'Cleaning up all users...');

  if (userId) {
    const res = await request(ctx, opts, `/users/${encodeURIComponent(userId)}/cleanup`, ReportResponse, {
      method: 'POST',
    });
    if (!res) {
      spinner?.stop('Cleanup failed', false);
      return 1;
    }
    const { report } = res.data;
    spinner?.stop(report.noop ? 'Nothing to do' : 'Cleanup complete', !report.aborted);
    if (opts.json) {
      writeJson(ctx, res.raw);
      return 0;
    }
    ctx.stdout.write(
      `  weekly ${String(report.weekly)}, monthly ${String(report.monthly)}, yearly ${String(report.yearly)}, ` +
        `archived ${String(report.archived)}, compressed ${String(report.compressed)}\n`
    );
    if (report.sizeTriggered.length > 0) {
      ctx.stdout.write(`  size-triggered: ${report.sizeTriggered.join(', ')}\n`);
    }
    return report.aborted ? 1 : 0;
  }

  const res = await request(ctx, opts, '/cleanup', RunStatsResponse, { method: 'POST', body: {} });
  if (!res) {
    spinner?.stop('Cleanup failed', false);
    return 1;
  }
  const { stats } = res.data;
  spinner?.stop(`Processed ${String(stats.processedUsers)} users`, stats.errors.length === 0);
  if (opts.json) {
    writeJson(ctx, res.raw);
    return 0;
  }
  ctx.stdout.write(
    `  weekly ${String(stats.weeklySummaries)}, monthly ${String(stats.monthlySummaries)}, ` +
      `yearly ${String(stats.yearlySummaries)}, archived ${String(stats.archived)}, compressed ${String(stats.compressed)}\n`
  );
  for (const e of stats.errors) {
    ctx.stderr.write(`  ${e.userId}: ${e.error}\n`);
  }
  return stats.errors.length === 0 ? 0 : 1;
}

async function runProtect(
  ctx: CommandContext,
  opts: Options,
  userId: string,
  entryId: string,
  note: string | undefined
): Promise<number> {
  const path = `/users/${encodeURIComponent(userId)}/protected/${encodeURIComponent(entryId)}`;
  const res = await request(ctx, opts, path, FactResponse, {
    method: 'POST',
    body: note !== undefined ? { note } : {},
  });
  if (!res) return 1;
  if (opts.json) {
    writeJson(ctx, res.raw);
    return 0;
  }
  ctx.stdout.write(`Protected ${res.data.fact.entryId} from ${res.data.fact.bucketId}\n`);
  return 0;
}

async function runUnprotect(ctx: CommandContext, opts: Options, userId: string, entryId: string): Promise<number> {
  const path = `/users/${encodeURIComponent(userId)}/protected/${encodeURIComponent(entryId)}`;
  const result = await apiCall(opts.baseUrl, `${PREFIX}${path}`, { method: 'DELETE' });
  if (!result.ok) {
    ctx.stderr.write(`Request failed: ${errorDetail(result)}\n`);
    return 1;
  }
  ctx.stdout.write(`Unprotected ${entryId}\n`);
  return 0;
}

async function runSnapshots(ctx: CommandContext, opts: Options, userId: string): Promise<number> {
  const res = await request(ctx, opts, `/users/${encodeURIComponent(userId)}/snapshots`, SnapshotsResponse);
  if (!res) return 1;
  if (opts.json) {
    writeJson(ctx, res.raw);
    return 0;
  }
  const rows = res.data.snapshots.map((s) => ({
    generation: String(s.generation),
    updated: formatTime(s.updatedAt),
    size: formatBytes(s.bytes),
  }));
  ctx.stdout.write(formatTable(rows, ['generation', 'updated', 'size']) + '\n');
  return 0;
}

async function runRollback(ctx: CommandContext, opts: Options, userId: string, generation: string): Promise<number> {
  const gen = Number(generation);
  if (!Number.isInteger(gen) || gen < 0) {
    ctx.stderr.write(`Invalid generation: ${generation}\n`);
    return 1;
  }
  const res = await request(ctx, opts, `/users/${encodeURIComponent(userId)}/rollback`, IndexResponse, {
    method: 'POST',
    body: { generation: gen },
  });
  if (!res) return 1;
  if (opts.json) {
    writeJson(ctx, res.raw);
    return 0;
  }
  ctx.stdout.write(`Restored snapshot ${generation}; index is now generation ${String(res.data.index.generation)}\n`);
  return 0;
}

export const memoryCommand: Command = {
  name: 'memory',
  aliases: ['mem'],
  description: 'Inspect and operate tiered memory',
  usage: 'tiermind memory <stats|context|cleanup|protect|unprotect|snapshots|rollback>',

  async run(ctx: CommandContext): Promise<number> {
    let argv = ctx.argv;

    const helpResult = extractBoolFlag(argv, 'help', 'h');
    if (helpResult.value) {
      ctx.stdout.write(USAGE);
      return 0;
    }
    argv = helpResult.rest;

    const urlResult = extractFlag(argv, 'url');
    argv = urlResult.rest;
    const noteResult = extractFlag(argv, 'note');
    argv = noteResult.rest;
    const jsonResult = extractBoolFlag(argv, 'json');
    argv = jsonResult.rest;

    const opts: Options = { baseUrl: urlResult.value ?? DEFAULT_URL, json: jsonResult.value };
    const [subcommand, ...args] = argv;
    const [userId = '', second = ''] = args;

    try {
      switch (subcommand) {
        case 'stats':
          if (!requireArgs(ctx, args, 1, 'stats <user>')) return 1;
          return await runStats(ctx, opts, userId);
        case 'context':
          if (!requireArgs(ctx, args, 1, 'context <user> <query...>')) return 1;
          return await runContext(ctx, opts, userId, args.slice(1).join(' '));
        case 'cleanup':
          return await runCleanup(ctx, opts, args[0]);
        case 'protect':
          if (!requireArgs(ctx, args, 2, 'protect <user> <entry> [--note <text>]')) return 1;
          return await runProtect(ctx, opts, userId, second, noteResult.value);
        case 'unprotect':
          if (!requireArgs(ctx, args, 2, 'unprotect <user> <entry>')) return 1;
          return await runUnprotect(ctx, opts, userId, second);
        case 'snapshots':
          if (!requireArgs(ctx, args, 1, 'snapshots <user>')) return 1;
          return await runSnapshots(ctx, opts, userId);
        case 'rollback':
          if (!requireArgs(ctx, args, 2, 'rollback <user> <generation>')) return 1;
          return await runRollback(ctx, opts, userId, second);
        case undefined:
          ctx.stderr.write(`Run 'tiermind memory --help' for usage.\n`);
          return 1;
        default:
          ctx.stderr.write(`Unknown subcommand: ${subcommand}\n`);
          ctx.stderr.write(`Run 'tiermind memory --help' for usage.\n`);
          return 1;
      }
    } catch (err) {
      ctx.stderr.write(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
      return 1;
    }
  },
};
