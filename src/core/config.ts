import path from 'path';
import fs from 'fs-extra';
import { z } from 'zod';
import { DEMANGLER_ABIS, type DemanglerAbi } from './engine/types';

export const DEFAULT_CONFIG_FILE = 'xref.config.json';
export const DEFAULT_OUTPUT_FILE = 'xref_data.json';

export interface XrefConfig {
  /** Canonical names starting with any of these are framework, runtime or SDK code. */
  excludedPrefixes: string[];
  /** Calling-convention and compiler-generated markers. */
  excludedSubstrings: string[];
  abi: DemanglerAbi;
  output: string;
}

export class ConfigError extends Error {
  constructor(message: string, readonly issues: string[] = []) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function defaultExcludedPrefixes(): string[] {
  return [
    'UnityEngine::',
    'Unity::',
    'UnityEngineInternal::',
    'Microsoft::VisualBasic',
    'System::',
    'Mono::',
    'MS::Internal',
    'Microsoft::Win32',
    'Interop::',
    'Epic::',
    'Sentry::',
    'Steamworks::',
    'Newtonsoft::Json:',
    'TMPro::',
    'Epic::OnlineServices',
    'PolyfillExtensions::',
    'Microsoft::CSharp',
    'Internal::',
    'Interop_SspiCli::',
    'std::',
    "namespace'::",
  ];
}

export function defaultExcludedSubstrings(): string[] {
  return ['__fastcall', '__cdecl', '__crt', 'stdcall', '_lambda_', '_expandlocale_'];
}

export function defaultXrefConfig(): XrefConfig {
  return {
    excludedPrefixes: defaultExcludedPrefixes(),
    excludedSubstrings: defaultExcludedSubstrings(),
    abi: 'msvc',
    output: DEFAULT_OUTPUT_FILE,
  };
}

const filterEntry = z.string().min(1, 'Filter entries must not be empty');

export const DemanglerAbiSchema = z.enum(DEMANGLER_ABIS);

export const XrefConfigFileSchema = z
  .object({
    excludedPrefixes: z.array(filterEntry).optional(),
    excludedSubstrings: z.array(filterEntry).optional(),
    abi: DemanglerAbiSchema.optional(),
    output: z.string().min(1).optional(),
    includeDefaults: z.boolean().default(true),
  })
  .strict();

export type XrefConfigFile = z.infer<typeof XrefConfigFileSchema>;

function unique(values: string[]): string[] {
  return Array.from(new Set(values));
}

export function applyConfigFile(base: XrefConfig, file: XrefConfigFile): XrefConfig {
  const combine = (defaults: string[], configured: string[] | undefined): string[] => {
    if (!configured) return defaults;
    return file.includeDefaults ? unique([...defaults, ...configured]) : unique(configured);
  };
  return {
    excludedPrefixes: combine(base.excludedPrefixes, file.excludedPrefixes),
    excludedSubstrings: combine(base.excludedSubstrings, file.excludedSubstrings),
    abi: file.abi ?? base.abi,
    output: file.output ?? base.output,
  };
}

export function mergeXrefConfig(base: XrefConfig, overrides?: Partial<XrefConfig>): XrefConfig {
  if (!overrides) return base;
  return {
    excludedPrefixes: overrides.excludedPrefixes ?? base.excludedPrefixes,
    excludedSubstrings: overrides.excludedSubstrings ?? base.excludedSubstrings,
    abi: overrides.abi ?? base.abi,
    output: overrides.output ?? base.output,
  };
}

export interface LoadConfigOptions {
  configPath?: string;
  cwd?: string;
}

/**
 * Resolve the run configuration. An explicit `configPath` must exist;
 * otherwise `xref.config.json` in `cwd` is picked up when present.
 */
export async function loadXrefConfig(options: LoadConfigOptions = {}): Promise<XrefConfig> {
  const cwd = options.cwd ?? process.cwd();
  let file: string | null = null;

  if (options.configPath) {
    file = path.resolve(cwd, options.configPath);
    if (!(await fs.pathExists(file))) {
      throw new ConfigError(`Config file not found: ${file}`);
    }
  } else {
    const candidate = path.join(cwd, DEFAULT_CONFIG_FILE);
    if (await fs.pathExists(candidate)) file = candidate;
  }

  if (!file) return defaultXrefConfig();

  let raw: unknown;
  try {
    raw = await fs.readJSON(file);
  } catch (e) {
    throw new ConfigError(`Cannot read config ${file}: ${e instanceof Error ? e.message : String(e)}`);
  }

  const parsed = XrefConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new ConfigError(`Invalid config ${file}`, issues);
  }
  return applyConfigFile(defaultXrefConfig(), parsed.data);
}
