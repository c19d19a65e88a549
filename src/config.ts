import * as yaml from 'js-yaml';
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import dotenv from 'dotenv';

dotenv.config();

const PROVIDER_KEY_VARS: Record<string, string[]> = {
  gemini: ['GOOGLE_GENERATIVE_AI_API_KEY', 'GEMINI_API_KEY'],
  claude: ['ANTHROPIC_API_KEY'],
  openai: ['OPENAI_API_KEY'],
  deepseek: ['DEEPSEEK_API_KEY'],
};

// Warns about missing provider keys; calls to that provider will fail at request time.
function validateEnvironmentVariables(): void {
  const missing = Object.entries(PROVIDER_KEY_VARS)
    .filter(([, names]) => names.every(name => !process.env[name]))
    .map(([provider]) => provider);

  if (missing.length > 0 && process.env.NODE_ENV !== 'test') {
    console.warn(`No API key set for providers: ${missing.join(', ')}`);
  }

  if (process.env.APP_PORT && (isNaN(Number(process.env.APP_PORT)) || Number(process.env.APP_PORT) < 1 || Number(process.env.APP_PORT) > 65535)) {
    console.warn('APP_PORT should be a valid port number (1-65535)');
  }
}

validateEnvironmentVariables();

const AppSettingsSchema = z.object({
  name: z.string().default('Sefirot Pipeline'),
  version: z.string().default('0.1.0'),
  host: z.string().default('0.0.0.0'),
  port: z.number().int().default(8000),
  log_level: z.string().default('INFO'),
  cors_allowed_origins_str: z.string().default('*'),
});

export type AppSettings = z.infer<typeof AppSettingsSchema>;

const CircuitBreakerSettingsSchema = z.object({
  failure_threshold: z.number().int().min(1).default(5),
  recovery_timeout_ms: z.number().int().min(0).default(30000),
  half_open_success_threshold: z.number().int().min(1).default(3),
});

export type CircuitBreakerSettings = z.infer<typeof CircuitBreakerSettingsSchema>;

const LlmSettingsSchema = z.object({
  timeout_ms: z.number().int().positive().default(30000),
  max_output_tokens: z.number().int().positive().default(4096),
  circuit_breaker: CircuitBreakerSettingsSchema.default({}),
});

export type LlmSettings = z.infer<typeof LlmSettingsSchema>;

export const StageModelSchema = z.object({
  provider: z.string().min(1),
  model: z.string().min(1),
});

export type StageModelConfig = z.infer<typeof StageModelSchema>;

const DEFAULT_STAGE_MODEL: StageModelConfig = { provider: 'gemini', model: 'gemini-2.0-flash-exp' };

const DEFAULT_STAGE_MODELS: Record<string, StageModelConfig> = {
  keter: DEFAULT_STAGE_MODEL,
  chochmah: DEFAULT_STAGE_MODEL,
  binah: DEFAULT_STAGE_MODEL,
  chesed: DEFAULT_STAGE_MODEL,
  gevurah: DEFAULT_STAGE_MODEL,
  tiferet: DEFAULT_STAGE_MODEL,
  netzach: DEFAULT_STAGE_MODEL,
  hod: DEFAULT_STAGE_MODEL,
  yesod: DEFAULT_STAGE_MODEL,
  malchut: DEFAULT_STAGE_MODEL,
};

export const DualModeSchema = z.enum(['auto', 'always', 'never']);

export type DualMode = z.infer<typeof DualModeSchema>;

const DualPerspectiveSettingsSchema = z.object({
  mode: DualModeSchema.default('auto'),
  secondary: StageModelSchema.nullable().default({ provider: 'deepseek', model: 'deepseek-chat' }),
  keywords_file: z.string().default('config/perspective-keywords.json'),
});

export type DualPerspectiveSettings = z.infer<typeof DualPerspectiveSettingsSchema>;

const KeterSettingsSchema = z.object({
  alignment_threshold: z.number().min(0).max(1).default(0.6),
  max_attempts: z.number().int().min(1).max(10).default(3),
});

export type KeterSettings = z.infer<typeof KeterSettingsSchema>;

const JobSettingsSchema = z.object({
  min_scenario_length: z.number().int().min(1).default(50),
  max_scenario_length: z.number().int().min(1).default(20000),
  estimated_time_seconds: z.number().positive().default(180),
});

export type JobSettings = z.infer<typeof JobSettingsSchema>;

const ExportSettingsSchema = z.object({
  output_dir: z.string().default('.'),
});

export const RuntimeSettingsSchema = z.object({
  app: AppSettingsSchema.default({}),
  llm: LlmSettingsSchema.default({}),
  stages: z.record(z.string(), StageModelSchema).default(DEFAULT_STAGE_MODELS),
  dual_perspective: DualPerspectiveSettingsSchema.default({}),
  keter: KeterSettingsSchema.default({}),
  jobs: JobSettingsSchema.default({}),
  export: ExportSettingsSchema.default({}),
});

export type RuntimeSettings = z.infer<typeof RuntimeSettingsSchema>;

// Compiled code runs from dist/src, sources from src; both sit under the project root.
export function resolveProjectPath(relativePath: string): string {
  const candidates = [
    path.resolve(__dirname, '..', relativePath),
    path.resolve(__dirname, '..', '..', relativePath),
  ];
  return candidates.find(candidate => fs.existsSync(candidate)) ?? candidates[0];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readSettingsFile(yamlPath: string): Record<string, unknown> {
  if (!fs.existsSync(yamlPath)) {
    console.warn(`Configuration file ${yamlPath} not found. Using environment variables and defaults.`);
    return {};
  }

  const fileContents = fs.readFileSync(yamlPath, 'utf8');
  if (!fileContents.trim()) {
    console.warn(`Configuration file ${yamlPath} is empty. Using defaults.`);
    return {};
  }

  const loadedData = yaml.load(fileContents);
  if (!isRecord(loadedData)) {
    throw new Error(`Invalid YAML structure in ${yamlPath}`);
  }
  return loadedData;
}

export function applyEnvironmentOverrides(
  data: Record<string, unknown>,
  env: NodeJS.ProcessEnv
): Record<string, unknown> {
  const app = isRecord(data.app) ? { ...data.app } : {};
  if (env.APP_HOST) app.host = env.APP_HOST;
  if (env.APP_PORT && !isNaN(Number(env.APP_PORT))) app.port = parseInt(env.APP_PORT, 10);
  if (env.APP_LOG_LEVEL) app.log_level = env.APP_LOG_LEVEL;

  const dual = isRecord(data.dual_perspective) ? { ...data.dual_perspective } : {};
  if (env.PIPELINE_DUAL_MODE) dual.mode = env.PIPELINE_DUAL_MODE.toLowerCase();

  return { ...data, app, dual_perspective: dual };
}

export function loadRuntimeSettings(
  yamlPath: string = resolveProjectPath(path.join('config', 'settings.yaml')),
  env: NodeJS.ProcessEnv = process.env
): RuntimeSettings {
  let data: Record<string, unknown> = {};

  try {
    data = readSettingsFile(yamlPath);
  } catch (error) {
    console.error(`Failed to load configuration from ${yamlPath}: ${error}`);
    if (env.NODE_ENV === 'production') {
      throw new Error(`Critical: Configuration loading failed in production. ${error}`);
    }
    console.warn('Development mode: Continuing with default configuration.');
  }

  const validated = RuntimeSettingsSchema.safeParse(applyEnvironmentOverrides(data, env));
  if (!validated.success) {
    const issues = validated.error.errors.map(err => `${err.path.join('.')}: ${err.message}`).join('; ');
    throw new Error(`Invalid configuration in ${yamlPath}: ${issues}`);
  }
  return validated.data;
}

export function loadPerspectiveKeywords(filePath: string): string[] {
  const resolved = path.isAbsolute(filePath) ? filePath : resolveProjectPath(filePath);
  if (!fs.existsSync(resolved)) {
    console.warn(`Perspective keyword file ${resolved} not found. Keyword-based dual analysis is disabled.`);
    return [];
  }
  const parsed: unknown = JSON.parse(fs.readFileSync(resolved, 'utf8'));
  return z.array(z.string().min(1)).parse(parsed).map(keyword => keyword.toLowerCase());
}

/** The first non-empty API key among the provider's variable names. */
export function providerApiKey(provider: string, env: NodeJS.ProcessEnv = process.env): string | undefined {
  const names = PROVIDER_KEY_VARS[provider] ?? [];
  return names.map(name => env[name]).find(value => Boolean(value));
}

export function hasProviderCredentials(provider: string, env: NodeJS.ProcessEnv = process.env): boolean {
  return providerApiKey(provider, env) !== undefined;
}

export const settings = loadRuntimeSettings();
export const perspectiveKeywords = loadPerspectiveKeywords(settings.dual_perspective.keywords_file);
