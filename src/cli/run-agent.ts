#!/usr/bin/env node
/**
 * CLI: run the agent on a task from stdin JSON -> JSONL events on stdout.
 *
 * Usage: echo '{"task":"...","reasoner":{"baseUrl":"...","model":"..."}}' | run-agent
 *
 * Launches a headless Chromium, runs the agent loop and streams every
 * AgentEvent to stdout so a supervising process can follow the run. The run
 * directory receives history.json, summary.md and the event/step logs.
 */

import { chromium, type Browser } from 'playwright';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { mkdtemp } from 'node:fs/promises';
import { z } from 'zod';

import { AgentConfigSchema } from '../schemas/config.schema.js';
import { applyEnvOverrides, resolveAgentConfig } from '../config/agent-config.js';
import { createDefaultRegistry } from '../actions/default-registry.js';
import { PlaywrightDriver } from '../engines/playwright-driver.js';
import { HttpClient } from '../reasoner/http-client.js';
import { ChatCompletionsReasoner } from '../reasoner/chat-completions.js';
import { AgentLoop } from '../runner/agent-loop.js';
import { CompositeEventSink, JsonlEventSink } from '../events/event-sink.js';
import { RunLogger } from '../logging/run-logger.js';
import { writeSummary } from '../logging/summary-writer.js';
import { MetricsCollector } from '../metrics/collector.js';
import { SensitiveDataFilter } from '../context/sensitive-data.js';
import { saveHistory } from '../history/history-export.js';
import { errorMessage } from '../exception/errors.js';

const CliInputSchema = z.object({
  task: z.string().min(1),
  config: AgentConfigSchema.partial().optional(),
  reasoner: z.object({
    baseUrl: z.string().url(),
    model: z.string().min(1),
    /** Name of the environment variable holding the API key. */
    apiKeyEnv: z.string().optional(),
    temperature: z.number().min(0).max(2).optional(),
    jsonMode: z.boolean().optional(),
  }),
  startUrl: z.string().url().optional(),
  runDir: z.string().optional(),
  headless: z.boolean().default(true),
});

type CliInput = z.infer<typeof CliInputSchema>;

// ── helpers ────────────────────────────────────────

function fail(error: string): void {
  process.stdout.write(JSON.stringify({ type: 'run_error', error }) + '\n');
  process.exitCode = 1;
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

function parseInput(raw: string): CliInput | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    fail('Invalid JSON on stdin');
    return null;
  }
  const parsed = CliInputSchema.safeParse(json);
  if (!parsed.success) {
    fail(`Invalid input: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
    return null;
  }
  return parsed.data;
}

// ── main ───────────────────────────────────────────

async function main(): Promise<void> {
  const input = parseInput(await readStdin());
  if (!input) return;

  // Nobody can answer a question over stdin once the task has been read.
  const config = { ...applyEnvOverrides(resolveAgentConfig(input.config ?? {})), pauseOnUserAction: false };
  const apiKey = input.reasoner.apiKeyEnv ? process.env[input.reasoner.apiKeyEnv] : undefined;
  if (input.reasoner.apiKeyEnv && !apiKey) {
    fail(`Environment variable ${input.reasoner.apiKeyEnv} is not set`);
    return;
  }

  const runDir = input.runDir ?? (await mkdtemp(join(tmpdir(), 'run-agent-')));
  const logger = new RunLogger(runDir, {
    filter: new SensitiveDataFilter(config.sensitiveData),
    render: { includeAttributes: config.includeAttributes, includeText: true },
  });
  const metrics = new MetricsCollector();

  let browser: Browser;
  try {
    browser = await chromium.launch({
      headless: input.headless,
      args: ['--no-sandbox', '--disable-setuid-sandbox'],
    });
  } catch (err) {
    fail(`Browser launch failed: ${errorMessage(err)}`);
    return;
  }

  try {
    const page = await browser.newPage();
    if (input.startUrl) {
      await page.goto(input.startUrl, { waitUntil: 'domcontentloaded', timeout: config.captureTimeoutMs });
    }

    const reasoner = new ChatCompletionsReasoner({
      client: new HttpClient({ baseUrl: input.reasoner.baseUrl, apiKey, defaultTimeoutMs: config.reasonerTimeoutMs }),
      model: input.reasoner.model,
      temperature: input.reasoner.temperature,
      jsonMode: input.reasoner.jsonMode,
    });

    const loop = new AgentLoop({
      task: input.task,
      driver: new PlaywrightDriver(page, { viewportExpansion: config.viewportExpansion }),
      reasoner,
      planner: config.planningInterval > 0 ? reasoner : undefined,
      registry: createDefaultRegistry({ excludeActions: config.excludeActions }),
      config,
      events: new CompositeEventSink([new JsonlEventSink(process.stdout), logger, metrics]),
    });

    const result = await loop.run();

    await logger.logHistory(result.history.steps);
    await saveHistory(result.history, join(runDir, 'history.json'));
    await writeSummary({ runDir, result, metrics: metrics.snapshot() });

    if (result.state === 'FAILED') {
      process.exitCode = 1;
    }
  } catch (err) {
    fail(errorMessage(err));
  } finally {
    await browser.close();
  }
}

main().catch((err: unknown) => {
  fail(errorMessage(err));
});
