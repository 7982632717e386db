#!/usr/bin/env node
import 'dotenv/config';
import { loadConfig } from './config/index.js';
import { PodcastPipeline } from './pipeline/index.js';
import { Scheduler } from './pipeline/scheduler.js';
import { PodcastHubError } from './errors.js';
import { formatDuration } from './utils/duration.js';
import { createLogger } from './utils/logger.js';

function argValue(args: string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  return args.find((a) => a.startsWith(prefix))?.slice(prefix.length);
}

function parseId(value: string): number {
  const id = Number.parseInt(value, 10);
  if (!Number.isInteger(id) || id <= 0) {
    throw new Error(`不正なIDです: ${value}`);
  }
  return id;
}

async function main(): Promise<void> {
  // コマンドライン引数を解析
  const args = process.argv.slice(2);
  const modeArg = argValue(args, 'mode');
  const modeOverride = modeArg === 'batch' || modeArg === 'once' ? modeArg : undefined;

  // 設定を読み込み
  const config = loadConfig(argValue(args, 'config'));

  // ロガーを初期化
  const logger = createLogger(config.logging);
  const mode = modeOverride ?? config.mode;

  const pipeline = new PodcastPipeline(config, { logger });
  await pipeline.initialize();

  const resolveUrl = argValue(args, 'resolve');
  if (resolveUrl) {
    const info = await pipeline.resolve(resolveUrl);
    const { episodes, ...metadata } = info;
    console.log(JSON.stringify({ ...metadata, episodes: episodes?.slice(0, 3) }, null, 2));
    return;
  }

  const addUrl = argValue(args, 'add');
  if (addUrl) {
    const result = await pipeline.addPodcast(addUrl);
    logger.info(
      {
        podcastId: result.podcast.id,
        title: result.podcast.title,
        created: result.created,
        inserted: result.sync?.inserted ?? 0,
      },
      result.created ? 'ポッドキャストを追加しました' : 'ポッドキャストは登録済みです'
    );
  }

  const refreshId = argValue(args, 'refresh');
  if (refreshId) {
    const { podcast, sync } = await pipeline.refreshPodcast(parseId(refreshId));
    logger.info({ podcastId: podcast.id, episodeCount: podcast.episodeCount, inserted: sync.inserted }, '更新しました');
  }

  const removeId = argValue(args, 'remove');
  if (removeId) {
    await pipeline.removePodcast(parseId(removeId));
    logger.info({ podcastId: removeId }, 'ポッドキャストを削除しました');
  }

  if (args.includes('--list')) {
    for (const podcast of await pipeline.listPodcasts()) {
      console.log(`[${podcast.id}] ${podcast.title} (${podcast.category}, ${podcast.episodeCount}集)`);
    }
  }

  const episodesId = argValue(args, 'episodes');
  if (episodesId) {
    for (const episode of await pipeline.listEpisodes(parseId(episodesId))) {
      console.log(`${episode.pubDate.slice(0, 10)}  ${formatDuration(episode.durationSeconds).padStart(8)}  ${episode.title}`);
    }
  }

  const playId = argValue(args, 'play');
  if (playId) {
    const target = await pipeline.playEpisode(parseId(playId));
    console.log(JSON.stringify(target, null, 2));
  }

  // --progress=<エピソードID>:<秒>
  const progressArg = argValue(args, 'progress');
  if (progressArg) {
    const [episodeId = '', seconds = ''] = progressArg.split(':');
    const episode = await pipeline.updateProgress(parseId(episodeId), Number(seconds));
    logger.info({ episodeId: episode.id, progress: episode.progress }, '再生位置を更新しました');
  }

  if (args.includes('--history')) {
    for (const entry of await pipeline.listHistory()) {
      console.log(`${entry.playedAt.slice(0, 16).replace('T', ' ')}  ${entry.podcastTitle} / ${entry.title}`);
    }
  }

  if (args.includes('--stats')) {
    const stats = await pipeline.getStats();
    console.log(`再生回数: ${stats.totalPlays}  累計: ${stats.totalDurationLabel}`);
    for (const podcast of stats.topPodcasts) {
      console.log(`  [${podcast.podcastId}] ${podcast.title} (${podcast.count})`);
    }
  }

  const favoriteId = argValue(args, 'favorite');
  if (favoriteId) {
    const added = await pipeline.addFavorite(parseId(favoriteId));
    logger.info({ podcastId: favoriteId }, added ? 'お気に入りに追加しました' : 'お気に入りに登録済みです');
  }

  const unfavoriteId = argValue(args, 'unfavorite');
  if (unfavoriteId) {
    const removed = await pipeline.removeFavorite(parseId(unfavoriteId));
    logger.info({ podcastId: unfavoriteId }, removed ? 'お気に入りから削除しました' : 'お気に入りに登録されていません');
  }

  if (args.includes('--favorites')) {
    for (const podcast of await pipeline.listFavorites()) {
      console.log(`[${podcast.id}] ${podcast.title} (${podcast.category})`);
    }
  }

  if (mode !== 'batch') {
    return;
  }

  // 定期実行モード
  const scheduler = new Scheduler(pipeline, config.schedule, logger);
  scheduler.start();

  // 起動時に1回実行するオプション
  if (args.includes('--run-now')) {
    logger.info('起動時に即座に実行します');
    await scheduler.runOnce();
  }

  // シグナルハンドリング
  const shutdown = () => {
    logger.info('シャットダウンを開始します');
    scheduler.stop();
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  if (error instanceof PodcastHubError) {
    console.error(`エラー [${error.code}]: ${error.message}`);
  } else {
    console.error('起動エラー:', error);
  }
  process.exit(1);
});
