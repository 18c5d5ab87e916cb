import os from 'node:os';
import path from 'node:path';

export function getDataDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.CODEPANE_DATA_DIR;
  if (override && override.trim()) return path.resolve(override);
  return path.join(os.homedir(), '.codepane');
}

export function settingsPath(dataDir: string): string {
  return path.join(dataDir, 'config.json');
}

export function historyDir(dataDir: string): string {
  return path.join(dataDir, 'history');
}
