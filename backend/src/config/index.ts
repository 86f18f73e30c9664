import dotenv from 'dotenv';
import path from 'path';

// Load environment variables
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

export interface Config {
  // Server
  port: number;
  nodeEnv: string;

  // File paths
  dataDir: string;
  uploadsDir: string;
  outputsDir: string;
  runsDir: string;

  // Processing
  maxFileSize: number;
  dialogueStyle: string;
}

function getEnvString(key: string, defaultValue: string = ''): string {
  return process.env[key] ?? defaultValue;
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

export function loadConfig(): Config {
  const dataDir = getEnvString('DATA_DIR', './data');

  return {
    // Server
    port: getEnvNumber('PORT', 3001),
    nodeEnv: getEnvString('NODE_ENV', 'development'),

    // File paths
    dataDir,
    uploadsDir: getEnvString('UPLOADS_DIR', `${dataDir}/uploads`),
    outputsDir: getEnvString('OUTPUTS_DIR', `${dataDir}/outputs`),
    runsDir: getEnvString('RUNS_DIR', `${dataDir}/runs`),

    // Processing
    maxFileSize: getEnvNumber('MAX_FILE_SIZE', 536870912), // 512MB
    dialogueStyle: getEnvString('DIALOGUE_STYLE', 'Dialogue'),
  };
}

export const config = loadConfig();
