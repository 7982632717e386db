import fs from 'fs';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { configSchema, type Config } from './schema.js';

// ${ENV_VAR} 形式の環境変数を解決
function resolveEnvVariables(obj: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof obj === 'string') {
    return obj.replace(/\$\{(\w+)\}/g, (_, envVar: string) => {
      return env[envVar] ?? '';
    });
  }
  if (Array.isArray(obj)) {
    return obj.map((item) => resolveEnvVariables(item, env));
  }
  if (isRecord(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = resolveEnvVariables(value, env);
    }
    return result;
  }
  return obj;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

// セクションを取り出す（なければ作る）
function section(config: Record<string, unknown>, key: string): Record<string, unknown> {
  const current = config[key];
  if (isRecord(current)) {
    return current;
  }
  const created: Record<string, unknown> = {};
  config[key] = created;
  return created;
}

// 設定ファイルを読み込む
export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): Config {
  const defaultConfigPath = path.resolve(process.cwd(), 'config/default.yaml');
  const filePath = configPath ?? defaultConfigPath;

  let rawConfig: unknown = {};

  if (fs.existsSync(filePath)) {
    const content = fs.readFileSync(filePath, 'utf-8');
    rawConfig = parseYaml(content);
  }

  // 環境変数を解決
  const resolved = resolveEnvVariables(rawConfig, env);
  const config: Record<string, unknown> = isRecord(resolved) ? resolved : {};

  // 環境変数からのオーバーライド
  if (env.DATA_DIR) {
    section(config, 'storage').dataDir = env.DATA_DIR;
  }
  if (env.LOG_LEVEL) {
    section(config, 'logging').level = env.LOG_LEVEL;
  }

  // バリデーションとデフォルト値の適用
  return configSchema.parse(config);
}

export { configSchema, type Config } from './schema.js';
