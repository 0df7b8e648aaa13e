import fp from 'fastify-plugin';

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

// Type-safe configuration interface
export interface AppConfig {
  port: number;
  host: string;
  databaseUrl: string;
  logLevel: (typeof LOG_LEVELS)[number];
  nodeEnv: string;
  trustProxy: boolean;
}

// Type augmentation: makes fastify.config available across all routes/plugins
declare module 'fastify' {
  interface FastifyInstance {
    config: AppConfig;
  }
}

function isLogLevel(value: string): value is AppConfig['logLevel'] {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Pure function to load and validate configuration from environment variables.
 *
 * @param env - Environment variables object (e.g., process.env)
 * @throws Error if configuration is invalid (lists all validation errors)
 */
export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  const errors: string[] = [];

  // Helper to treat empty strings as undefined
  const getValue = (key: string): string | undefined => {
    const value = env[key];
    return value === '' ? undefined : value;
  };

  // Parse and validate PORT
  const portStr = getValue('PORT') ?? '3000';
  const port = parseInt(portStr, 10);
  if (isNaN(port)) {
    errors.push(`PORT must be a valid number, got: ${portStr}`);
  } else if (port < 0 || port > 65535) {
    errors.push(`PORT must be in range 0-65535, got: ${port}`);
  }

  const host = getValue('HOST') ?? '0.0.0.0';

  const databaseUrl = getValue('DATABASE_URL') ?? '/app/data/studio-ledger.db';

  // Parse and validate LOG_LEVEL
  const logLevelStr = (getValue('LOG_LEVEL') ?? 'info').toLowerCase();
  let logLevel: AppConfig['logLevel'] = 'info';
  if (isLogLevel(logLevelStr)) {
    logLevel = logLevelStr;
  } else {
    errors.push(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got: ${getValue('LOG_LEVEL')}`);
  }

  const nodeEnv = getValue('NODE_ENV') ?? 'production';

  // Parse TRUST_PROXY (boolean, default false)
  const trustProxyStr = (getValue('TRUST_PROXY') ?? 'false').toLowerCase();
  let trustProxy = false;
  if (trustProxyStr === 'true') {
    trustProxy = true;
  } else if (trustProxyStr !== 'false') {
    errors.push(`TRUST_PROXY must be 'true' or 'false', got: ${getValue('TRUST_PROXY')}`);
  }

  // If there are any validation errors, throw a single error listing all of them
  if (errors.length > 0) {
    throw new Error(`Configuration validation failed:\n  - ${errors.join('\n  - ')}`);
  }

  return {
    port,
    host,
    databaseUrl,
    logLevel,
    nodeEnv,
    trustProxy,
  };
}

export interface ConfigPluginOptions {
  /** Configuration already loaded by the caller; read from process.env when absent. */
  config?: AppConfig;
}

export default fp<ConfigPluginOptions>(
  async function configPlugin(fastify, opts) {
    const config = opts.config ?? loadConfig(process.env);

    fastify.log.info(config, 'Configuration loaded');

    fastify.decorate('config', config);
  },
  {
    name: 'config',
  },
);
