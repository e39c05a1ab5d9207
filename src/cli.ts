#!/usr/bin/env node
import { createInterface } from "node:readline";
import chalk from "chalk";
import Table from "cli-table3";
import { Command } from "commander";
import ora from "ora";
import { z } from "zod";
import { parseRepo } from "./config.js";
import { type PipelineContext, createPipelineContext } from "./context.js";
import { toError } from "./errors.js";
import type { ItemFailure } from "./types.js";

const program = new Command();

program
  .name("pr-indexer")
  .description("Index GitHub pull requests into a local vector store and search them by meaning")
  .version("0.1.0")
  .option("-c, --config <path>", "Path to pr-indexer.config.yaml");

// ── helpers ─────────────────────────────────────────────────────
function parsePositiveInt(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) throw new Error(`--${name} must be a positive integer, got "${value}"`);
  return n;
}

const StateOption = z.enum(["open", "closed", "all"]);

function printFailures(failures: ItemFailure[]): void {
  if (failures.length === 0) return;
  const table = new Table({ head: ["#", "Stage", "Error"], colWidths: [8, 10, 70], wordWrap: true });
  for (const f of failures) {
    table.push([f.id ?? "?", f.stage, f.error.message]);
  }
  console.log(chalk.yellow(`\n${failures.length} record(s) failed:`));
  console.log(table.toString());
}

async function withContext(
  opts: { withSource?: boolean; batchSize?: number; allowIncompatible?: boolean },
  fn: (ctx: PipelineContext) => Promise<void>,
): Promise<void> {
  const ctx = await createPipelineContext({ configPath: program.opts<{ config?: string }>().config, ...opts });
  try {
    await fn(ctx);
  } finally {
    ctx.store.close();
  }
}

// ── index ───────────────────────────────────────────────────────
program
  .command("index <repo>")
  .description("Fetch a repository's pull requests and index them in chunks")
  .option("-s, --state <state>", "open, closed or all")
  .option("-l, --limit <number>", "Maximum number of PRs to fetch")
  .option("-b, --batch-size <number>", "Records per chunk")
  .action(async (repoArg: string, opts: { state?: string; limit?: string; batchSize?: string }) => {
    const { owner, repo } = parseRepo(repoArg);
    const repoFull = `${owner}/${repo}`;
    const limit = parsePositiveInt(opts.limit, "limit");
    const batchSize = parsePositiveInt(opts.batchSize, "batch-size");

    await withContext({ withSource: true, batchSize }, async (ctx) => {
      const fetchDefaults = ctx.config.fetch;
      const state = opts.state ? StateOption.parse(opts.state) : fetchDefaults.state;

      if (ctx.github && limit) {
        const warning = ctx.github.formatRateLimitWarning(ctx.github.estimateAPICallsNeeded(limit));
        if (warning) console.log(chalk.yellow(warning));
      }

      const spinner = ora(`Indexing ${state} PRs from ${repoFull}...`).start();
      const report = await ctx.processor.processRepository(repoFull, {
        state,
        sort: fetchDefaults.sort,
        direction: fetchDefaults.direction,
        limit: limit ?? fetchDefaults.limit,
        onProgress: (r) => {
          spinner.text = `Indexing ${repoFull}... chunk ${r.chunks}, ${r.stored.length} stored, ${r.failures.length} failed`;
        },
      });

      const summary = `${report.stored.length} PRs stored in ${report.chunks} chunk(s)`;
      if (report.failures.length === 0) spinner.succeed(summary);
      else spinner.warn(`${summary}, ${report.failures.length} failed`);
      printFailures(report.failures);

      if (ctx.github) {
        const rl = ctx.github.getRateLimit();
        console.log(chalk.dim(`API budget: ${rl.remaining}/${rl.limit} remaining`));
      }
    });
  });

// ── add ─────────────────────────────────────────────────────────
program
  .command("add <repo> <number>")
  .description("Fetch and index a single pull request")
  .action(async (repoArg: string, numberArg: string) => {
    const { owner, repo } = parseRepo(repoArg);
    const prNumber = parsePositiveInt(numberArg, "number") ?? 0;

    await withContext({ withSource: true }, async (ctx) => {
      if (!ctx.github) throw new Error("GitHub client unavailable");
      const spinner = ora(`Fetching ${owner}/${repo}#${prNumber}...`).start();
      const pr = await ctx.github.fetchOne(`${owner}/${repo}`, prNumber);
      spinner.text = `Indexing #${prNumber}...`;
      const record = await ctx.processor.processOne(pr);
      spinner.succeed(`Indexed #${record.id}: ${record.title}`);
    });
  });

// ── search ──────────────────────────────────────────────────────
program
  .command("search <query>")
  .description("Find indexed pull requests similar to a query")
  .option("-n, --limit <number>", "Number of results", "5")
  .option("-r, --repo <owner/repo>", "Only search this repository")
  .action(async (query: string, opts: { limit: string; repo?: string }) => {
    const limit = parsePositiveInt(opts.limit, "limit") ?? 5;
    const scope = opts.repo ? parseRepo(opts.repo) : undefined;
    const repoName = scope ? `${scope.owner}/${scope.repo}` : undefined;

    await withContext({}, async (ctx) => {
      const hits = await ctx.processor.searchSimilar(query, limit, { repoName });
      if (hits.length === 0) {
        console.log(chalk.yellow("No matches. Run `pr-indexer index <repo>` first."));
        return;
      }

      const table = new Table({
        head: ["Score", "#", "Repo", "State", "Title"],
        colWidths: [8, 8, 24, 8, 50],
      });
      for (const { record, score } of hits) {
        table.push([score.toFixed(3), record.id, record.repoName.slice(0, 22), record.state, record.title.slice(0, 48)]);
      }
      console.log(table.toString());
    });
  });

// ── delete ──────────────────────────────────────────────────────
program
  .command("delete <id>")
  .description("Remove one pull request from the index")
  .action(async (idArg: string) => {
    const id = parsePositiveInt(idArg, "id") ?? 0;
    await withContext({}, async (ctx) => {
      ctx.processor.deleteOne(id);
      console.log(`${chalk.green("✓")} Removed #${id} (if it was indexed)`);
    });
  });

// ── reset ───────────────────────────────────────────────────────
program
  .command("reset")
  .description("Delete the whole collection")
  .option("-y, --yes", "Skip confirmation prompt")
  .action(async (opts: { yes?: boolean }) => {
    if (!opts.yes) {
      const rl = createInterface({ input: process.stdin, output: process.stdout });
      const answer = await new Promise<string>((resolve) => {
        rl.question(chalk.yellow("Delete the collection and every indexed PR? (y/N) "), resolve);
      });
      rl.close();
      if (answer.toLowerCase() !== "y") {
        console.log("Cancelled.");
        return;
      }
    }

    await withContext({ allowIncompatible: true }, async (ctx) => {
      ctx.processor.deleteAll();
      console.log(`${chalk.green("✓")} Collection ${ctx.store.collection} deleted. Run \`pr-indexer index\` to rebuild.`);
    });
  });

// ── status ──────────────────────────────────────────────────────
program
  .command("status")
  .description("Show collection stats")
  .action(async () => {
    await withContext({}, async (ctx) => {
      console.log(chalk.bold("pr-indexer status\n"));
      console.log(`  Collection: ${ctx.store.collection} (${ctx.store.distance}, ${ctx.store.dimensions} dims)`);
      console.log(`  Points:     ${ctx.store.count()}`);
      console.log(`  Batch size: ${ctx.processor.batchSize}`);
      console.log(`  Provider:   ${ctx.env.EMBEDDING_PROVIDER} (${ctx.env.EMBEDDING_MODEL})`);
    });
  });

program.parseAsync().catch((err: unknown) => {
  console.error(chalk.red(`error: ${toError(err).message}`));
  process.exitCode = 1;
});
