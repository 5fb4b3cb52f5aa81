import * as dotenv from 'dotenv';
import { z } from 'zod';

// Load environment variables from .env file
dotenv.config();

export const DEFAULT_SYSTEM_PROMPT = `You are a financial crime & AML analyst assistant.
Be precise, structured, and evidence-based. Avoid hallucinations.
If information is missing, say "unknown".`;

export interface Config {
  server: {
    name: string;
    version: string;
    port: number;
    corsOrigins: string[];
    debug: boolean;
  };
  mistral: {
    apiUrl: string;
    apiKey?: string;
    model: string;
    temperature: number;
    maxTokens: number;
    requestTimeoutMs: number;
  };
  prompt: {
    systemPrompt: string;
    contextBudgetChars: number;
  };
  retry: {
    maxAttempts: number;
    initialDelayMs: number;
    maxDelayMs: number;
  };
  sessions: {
    lockTtlMinutes: number;
  };
}

// Zod validation schema
const ConfigSchema = z.object({
  server: z.object({
    name: z.string().min(1, 'Server name must not be empty'),
    version: z.string().min(1, 'Version must not be empty'),
    port: z.number().int().min(0).max(65535),
    corsOrigins: z.array(z.string().min(1)).min(1, 'At least 1 CORS origin is required'),
    debug: z.boolean(),
  }),
  mistral: z.object({
    apiUrl: z.string().url('Invalid Mistral API URL format'),
    apiKey: z.string().min(1).optional(),
    model: z.string().min(1, 'Model name must not be empty'),
    temperature: z.number().min(0).max(1.5),
    maxTokens: z.number().int().min(1).max(32768),
    requestTimeoutMs: z.number().int().min(1000).max(300000),
  }),
  prompt: z.object({
    systemPrompt: z.string(),
    contextBudgetChars: z.number().int().min(100).max(1000000),
  }),
  retry: z.object({
    maxAttempts: z.number().int().min(1).max(10),
    initialDelayMs: z.number().int().min(0).max(10000),
    maxDelayMs: z.number().int().min(0).max(60000),
  }),
  sessions: z.object({
    lockTtlMinutes: z.number().int().min(1).max(1440),
  }),
});

/**
 * Parse command line arguments
 * Usage: node dist/src/index.js --port 8000 --model mistral-small-latest --debug
 */
export function parseArgs(argv: string[]): Record<string, string | boolean> {
  const args: Record<string, string | boolean> = {};

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];

    if (arg.startsWith('--')) {
      const key = arg.slice(2);

      // Check if next arg is a value or another flag
      if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
        args[key] = argv[++i];
      } else {
        args[key] = true;
      }
    }
  }

  return args;
}

/**
 * Build configuration from CLI arguments and environment variables.
 * Throws ZodError when a value is out of range.
 */
export function loadConfig(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): Config {
  const cliArgs = parseArgs(argv);

  // Helpers: CLI args win over env, env over defaults
  const getString = (cliKey: string, envKey: string, defaultValue: string): string => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return cliValue;
    return env[envKey] || defaultValue;
  };

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    if (cliArgs[cliKey] !== undefined) return cliArgs[cliKey] === true || cliArgs[cliKey] === 'true';
    const envValue = env[envKey];
    return envValue === 'true' ? true : envValue === 'false' ? false : defaultValue;
  };

  const getNumber = (cliKey: string, envKey: string, defaultValue: number): number => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return Number(cliValue);
    const envValue = env[envKey];
    return envValue ? Number(envValue) : defaultValue;
  };

  const getStringArray = (cliKey: string, envKey: string, defaultValue: string[]): string[] => {
    const value = getString(cliKey, envKey, '');
    if (!value) return defaultValue;
    return value.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
  };

  const rawConfig = {
    server: {
      name: getString('server-name', 'SERVER_NAME', 'risk-copilot'),
      version: getString('server-version', 'SERVER_VERSION', '1.1.0'),
      port: getNumber('port', 'PORT', 8000),
      corsOrigins: getStringArray('cors-origins', 'CORS_ORIGINS', ['*']),
      debug: getBoolean('debug', 'DEBUG', false),
    },
    mistral: {
      apiUrl: getString('api-url', 'MISTRAL_API_URL', 'https://api.mistral.ai').replace(/\/+$/, ''),
      // The key is read from the environment only, never from argv
      apiKey: env.MISTRAL_API_KEY || undefined,
      model: getString('model', 'MISTRAL_MODEL', 'mistral-large-latest'),
      temperature: getNumber('temperature', 'MODEL_TEMPERATURE', 0.2),
      maxTokens: getNumber('max-tokens', 'MODEL_MAX_TOKENS', 650),
      requestTimeoutMs: getNumber('request-timeout', 'REQUEST_TIMEOUT_MS', 30000),
    },
    prompt: {
      systemPrompt: getString('system-prompt', 'SYSTEM_PROMPT', DEFAULT_SYSTEM_PROMPT),
      contextBudgetChars: getNumber('context-budget', 'CONTEXT_BUDGET_CHARS', 12000),
    },
    retry: {
      maxAttempts: getNumber('retry-attempts', 'RETRY_MAX_ATTEMPTS', 3),
      initialDelayMs: getNumber('retry-initial-delay', 'RETRY_INITIAL_DELAY_MS', 500),
      maxDelayMs: getNumber('retry-max-delay', 'RETRY_MAX_DELAY_MS', 4000),
    },
    sessions: {
      lockTtlMinutes: getNumber('lock-ttl', 'SESSION_LOCK_TTL_MINUTES', 30),
    },
  };

  return ConfigSchema.parse(rawConfig);
}

/**
 * Get configuration, printing validation errors and exiting when invalid
 */
export function getConfig(): Config {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('\n❌ Configuration Validation Failed!\n');
      console.error('Errors:');
      error.errors.forEach((err) => {
        const path = err.path.join('.');
        console.error(`  • ${path || 'root'}: ${err.message}`);
      });
      console.error('\n💡 Tips:');
      console.error('  - Check your .env file');
      console.error('  - Verify CLI arguments');
      console.error('  - Mistral API URL must be valid (e.g., https://api.mistral.ai)');
      console.error();
      process.exit(1);
    }
    throw error;
  }
}

/**
 * Print configuration; the API key is reported as present or missing only
 */
export function printConfigInfo(config: Config): void {
  console.error('╔══════════════════════════════════════════════════════════════════╗');
  console.error('║                 Risk Copilot Backend - Configuration             ║');
  console.error('╚══════════════════════════════════════════════════════════════════╝');

  console.error(`\n📊 Server: ${config.server.name} v${config.server.version} ${config.server.debug ? '(Debug Mode)' : ''}`);
  console.error(`🔗 Mistral: ${config.mistral.apiUrl} (model: ${config.mistral.model})`);
  console.error(`🔑 API key: ${config.mistral.apiKey ? 'configured' : 'MISSING (set MISTRAL_API_KEY)'}`);
  console.error(`⏱️  Timeout: ${config.mistral.requestTimeoutMs}ms | Retry: ${config.retry.maxAttempts}x (${config.retry.initialDelayMs}-${config.retry.maxDelayMs}ms)`);
  console.error(`📝 Context budget: ${config.prompt.contextBudgetChars} chars`);
  console.error(`\n🌐 API: http://localhost:${config.server.port}`);

  console.error('\n' + '─'.repeat(68));
}
