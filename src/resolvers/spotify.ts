import type { EngineContext } from '../platforms/context.js';
import { createPodcastInfo, type PodcastInfo, type Resolver } from './types.js';

export const SPOTIFY_UNSUPPORTED_DESCRIPTION = 'Spotify 播客的深度解析尚未实现（需要 Spotify API）';

// 未対応であることを明示したスタブを返す
export class SpotifyResolver implements Resolver {
  readonly platform = 'spotify';

  private context: EngineContext;

  constructor(context: EngineContext) {
    this.context = context;
  }

  async resolve(url: string): Promise<PodcastInfo> {
    this.context.logger.warn({ url }, 'Spotifyのエピソード抽出は未対応です');

    return createPodcastInfo({
      platform: this.platform,
      title: 'Spotify 播客',
      description: SPOTIFY_UNSUPPORTED_DESCRIPTION,
      feedUrl: url,
      sourceUrl: url,
      category: 'Spotify',
      episodeCount: 0,
    });
  }
}
