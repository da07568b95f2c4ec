// Invocation config loader: reads a YAML file describing the devices, the
// target preparers and the tests of one invocation.
// Relative directories resolve against the config file's own directory.
import fs from 'fs/promises';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { HarnessError, HarnessErrorCode, describeError } from '../shared/errors.js';
import { formatIssues } from './options.js';

const pluginEntrySchema = z.object({
  alias: z.string().min(1),
  options: z.record(z.unknown()).default(() => ({})),
});

const invocationConfigSchema = z.object({
  devices: z.array(z.object({ serial: z.string().min(1) })).min(1),
  adb_path: z.string().min(1).default('adb'),
  fastboot_path: z.string().min(1).default('fastboot'),
  command_timeout_ms: z.number().int().positive().default(120_000),
  boot_timeout_ms: z.number().int().positive().default(300_000),
  dependencies_dir: z.string().min(1).optional(),
  testcases_dir: z.string().min(1).default('testcases'),
  target_preparers: z.array(pluginEntrySchema).default(() => []),
  tests: z.array(pluginEntrySchema).default(() => []),
});

export interface PluginEntry {
  alias: string;
  options: Record<string, unknown>;
}

export interface InvocationConfig {
  devices: { serial: string }[];
  adbPath: string;
  fastbootPath: string;
  commandTimeoutMs: number;
  bootTimeoutMs: number;
  /** Absent means a fresh temporary directory per invocation. */
  dependenciesDir?: string;
  testcasesDir: string;
  targetPreparers: PluginEntry[];
  tests: PluginEntry[];
}

export function parseInvocationConfig(yamlText: string, baseDir: string): InvocationConfig {
  let raw: unknown;
  try {
    raw = parseYaml(yamlText);
  } catch (e) {
    throw new HarnessError(HarnessErrorCode.CONFIG_ERROR, `Invalid YAML: ${describeError(e)}`);
  }

  const result = invocationConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new HarnessError(
      HarnessErrorCode.CONFIG_ERROR,
      `Invalid invocation config: ${formatIssues(result.error)}`,
      { issues: result.error.issues }
    );
  }

  const parsed = result.data;
  return {
    devices: parsed.devices,
    adbPath: parsed.adb_path,
    fastbootPath: parsed.fastboot_path,
    commandTimeoutMs: parsed.command_timeout_ms,
    bootTimeoutMs: parsed.boot_timeout_ms,
    dependenciesDir: parsed.dependencies_dir ? path.resolve(baseDir, parsed.dependencies_dir) : undefined,
    testcasesDir: path.resolve(baseDir, parsed.testcases_dir),
    targetPreparers: parsed.target_preparers,
    tests: parsed.tests,
  };
}

export async function loadInvocationConfig(configPath: string): Promise<InvocationConfig> {
  const absolutePath = path.resolve(configPath);
  let raw: string;
  try {
    raw = await fs.readFile(absolutePath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new HarnessError(HarnessErrorCode.CONFIG_ERROR, `Invocation config not found: ${absolutePath}`);
    }
    throw err;
  }
  return parseInvocationConfig(raw, path.dirname(absolutePath));
}
