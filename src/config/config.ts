import dotenv from 'dotenv';
import path from 'path';
import { defaultConfig } from './defaults';
import { ConfigurationError } from '../utils/errors';

dotenv.config();

export interface Config {
  node: {
    name: string;
  };
  admin: {
    address: string;
    timeout: number;
    maxResponseBytes: number;
  };
  server: {
    listenAddress: string;
    nodeEnv: string;
  };
  web: {
    publicDir: string;
    templatePath: string;
  };
  logging: {
    level: string;
    file: string;
  };
}

/**
 * Values given on the command line. They take precedence over the environment.
 */
export interface ConfigOverrides {
  nodeName?: string;
  adminAddress?: string;
  listenAddress?: string;
  templatePath?: string;
  publicDir?: string;
  adminTimeout?: string;
}

function parsePositiveInt(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Logging settings only. Read without validation so the logger can be created before
 * the rest of the configuration is checked.
 */
export function getLoggingConfig(env: NodeJS.ProcessEnv = process.env): Config['logging'] & { nodeEnv: string } {
  return {
    level: env.LOG_LEVEL || defaultConfig.logging.level,
    file: env.LOG_FILE || defaultConfig.logging.file,
    nodeEnv: env.NODE_ENV || 'production',
  };
}

export function getConfig(overrides: ConfigOverrides = {}, env: NodeJS.ProcessEnv = process.env): Config {
  const logging = getLoggingConfig(env);
  const publicDir = path.resolve(overrides.publicDir || env.PUBLIC_DIR || defaultConfig.web.publicDir);

  const config: Config = {
    node: {
      name: overrides.nodeName || env.NODE_NAME || defaultConfig.node.name,
    },
    admin: {
      address: overrides.adminAddress || env.ADMIN_ADDR || defaultConfig.admin.address,
      timeout: parsePositiveInt(
        'ADMIN_TIMEOUT',
        overrides.adminTimeout || env.ADMIN_TIMEOUT || defaultConfig.admin.timeout.toString()
      ),
      maxResponseBytes: parsePositiveInt(
        'ADMIN_MAX_RESPONSE_BYTES',
        env.ADMIN_MAX_RESPONSE_BYTES || defaultConfig.admin.maxResponseBytes.toString()
      ),
    },
    server: {
      listenAddress: overrides.listenAddress || env.LISTEN_ADDR || defaultConfig.server.listenAddress,
      nodeEnv: env.NODE_ENV || 'production',
    },
    web: {
      publicDir,
      templatePath: path.resolve(
        overrides.templatePath || env.TEMPLATE_PATH || path.join(publicDir, 'template.html')
      ),
    },
    logging: {
      level: logging.level,
      file: logging.file,
    },
  };

  return config;
}
