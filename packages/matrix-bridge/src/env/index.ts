import * as logging from '../logging';
import type { BridgeType } from '../models/bridge-record';

export interface Environment {
  matrix: {
    homeserver?: string;
    sharedSecret?: string;
    storePath?: string;
  };
  bots: Partial<Record<BridgeType, string>>;
  dataDir?: string;
  networksPath?: string;
  api: {
    hostname?: string;
    port?: number;
    token?: string;
  };
  logging: Partial<logging.Config>;
}

const envStr = (name: string) => {
  const str = process.env[name];
  if (str === undefined || str.length === 0) return undefined;
  return str;
};

const envInt = (name: string) => {
  const parsed = parseInt(process.env[name] || '', 10);
  return isNaN(parsed) ? undefined : parsed;
};

const envBool = (name: string): boolean | undefined => {
  const str = process.env[name]
  return str === 'true' || str === '1' ? true
    : str === 'false' || str === '0' ? false : undefined
}

const envLevel = (name: string): logging.Level | undefined => {
  const str = envStr(name);
  return str !== undefined && logging.isLevel(str) ? str : undefined;
};

const readLogging = (): Partial<logging.Config> => {
  const config: Partial<logging.Config> = {};

  const level = envLevel('LOG_LEVEL');
  const timestamp = envBool('LOG_TIMESTAMP');
  const useConsole = envBool('LOG_CONSOLE');
  const file = envStr('LOG_FILE');

  if (level !== undefined) config.level = level;
  if (timestamp !== undefined) config.timestamp = timestamp;
  if (useConsole !== undefined) config.console = useConsole;
  if (file !== undefined) config.files = { info: file };

  return config;
};

export const readEnv = (): Environment => ({
  matrix: {
    homeserver: envStr('MATRIX_HOMESERVER'),
    sharedSecret: envStr('MATRIX_SHARED_SECRET'),
    storePath: envStr('MATRIX_STORE_PATH'),
  },
  bots: {
    whatsapp: envStr('WHATSAPP_BRIDGE_BOT'),
    signal: envStr('SIGNAL_BRIDGE_BOT'),
    telegram: envStr('TELEGRAM_BRIDGE_BOT'),
  },
  dataDir: envStr('DATA_DIR'),
  networksPath: envStr('NETWORKS_PATH'),
  api: {
    hostname: envStr('API_HOSTNAME'),
    port: envInt('API_PORT'),
    token: envStr('API_TOKEN'),
  },
  logging: readLogging(),
});

/** Redacts secrets before the environment is logged. */
export const describeEnv = (env: Environment): string =>
  JSON.stringify(
    {
      ...env,
      matrix: { ...env.matrix, sharedSecret: env.matrix.sharedSecret && '<redacted>' },
      api: { ...env.api, token: env.api.token && '<redacted>' },
    },
    null,
    2
  );
