import { config } from 'dotenv';

config();

export const OPENAI_API_KEY = process.env.OPENAI_API_KEY ?? '';
export let DEBUG_MODE = process.env.DEBUG_MODE === 'true';
export let SIMULATE = process.env.RINGLINK_SIMULATE === 'true';
export let AUTO_CONNECT = process.env.RINGLINK_AUTO_CONNECT !== 'false';

const cliArgs = process.argv.slice(2);
let configPathArg: string | undefined = process.env.RINGLINK_CONFIG || undefined;
let logFileArg: string | undefined = process.env.RINGLINK_LOG_FILE || undefined;

for (let i = 0; i < cliArgs.length; i++) {
  const arg = cliArgs[i];
  switch (arg) {
    case '--config':
      if (cliArgs[i + 1]) {
        configPathArg = cliArgs[++i];
      }
      break;
    case '--log-file':
      if (cliArgs[i + 1]) {
        logFileArg = cliArgs[++i];
      }
      break;
    case '--debug':
      DEBUG_MODE = true;
      break;
    case '--no-debug':
      DEBUG_MODE = false;
      break;
    case '--simulate':
      SIMULATE = true;
      break;
    case '--no-simulate':
      SIMULATE = false;
      break;
    case '--auto-connect':
      AUTO_CONNECT = true;
      break;
    case '--no-auto-connect':
      AUTO_CONNECT = false;
      break;
    default:
      break;
  }
}

export const CONFIG_PATH = configPathArg;
export const LOG_FILE = logFileArg;
