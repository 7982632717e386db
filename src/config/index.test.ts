import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { loadConfig } from './index.js';

describe('loadConfig', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'podcast-hub-config-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function writeConfig(content: string): Promise<string> {
    const filePath = path.join(tempDir, 'config.yaml');
    await fs.writeFile(filePath, content, 'utf-8');
    return filePath;
  }

  it('ファイルがなければ既定値を使う', () => {
    const config = loadConfig(path.join(tempDir, 'missing.yaml'), {});

    expect(config.mode).toBe('once');
    expect(config.storage.dataDir).toBe('./data');
    expect(config.http.pageTimeoutMs).toBe(15000);
    expect(config.http.lookupTimeoutMs).toBe(10000);
    expect(config.platforms.neteaseFeedBase).toBe('https://podcastrx.netlify.app/feed/netease/');
    expect(config.schedule).toEqual({ cron: '0 */6 * * *', timezone: 'Asia/Shanghai' });
  });

  it('YAMLの値を読み込み、足りない項目は既定値で埋める', async () => {
    const filePath = await writeConfig(`
mode: batch
http:
  pageTimeoutMs: 5000
logging:
  level: debug
  pretty: false
`);

    const config = loadConfig(filePath, {});

    expect(config.mode).toBe('batch');
    expect(config.http.pageTimeoutMs).toBe(5000);
    expect(config.http.lookupTimeoutMs).toBe(10000);
    expect(config.logging).toEqual({ level: 'debug', pretty: false });
  });

  it('${VAR} を環境変数で置き換える', async () => {
    const filePath = await writeConfig(`
platforms:
  neteaseFeedBase: \${NETEASE_FEED}
`);

    const config = loadConfig(filePath, { NETEASE_FEED: 'https://feeds.example.com/netease/' });

    expect(config.platforms.neteaseFeedBase).toBe('https://feeds.example.com/netease/');
  });

  it('DATA_DIR と LOG_LEVEL はファイルの値より優先する', async () => {
    const filePath = await writeConfig(`
storage:
  dataDir: ./from-file
logging:
  level: info
`);

    const config = loadConfig(filePath, { DATA_DIR: '/tmp/podcast-data', LOG_LEVEL: 'warn' });

    expect(config.storage.dataDir).toBe('/tmp/podcast-data');
    expect(config.logging.level).toBe('warn');
  });

  it('不正な値は検証エラーになる', async () => {
    const filePath = await writeConfig('mode: sometimes\n');

    expect(() => loadConfig(filePath, {})).toThrow();
  });
});
