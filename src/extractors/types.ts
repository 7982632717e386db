// エピソード情報（フィード・ページから抽出した生データ）
export interface EpisodeEntry {
  readonly title: string;
  readonly description: string;
  readonly audioUrl: string;         // ポッドキャスト内での重複判定キー
  readonly durationSeconds: number;  // 0以上の整数
  readonly rawPubDate?: string;      // 未解析の公開日時
}

export function createEpisodeEntry(fields: {
  title?: string;
  description?: string;
  audioUrl?: string;
  durationSeconds?: number;
  rawPubDate?: string;
}): EpisodeEntry {
  return Object.freeze({
    title: fields.title ?? '',
    description: fields.description ?? '',
    audioUrl: fields.audioUrl ?? '',
    durationSeconds: Math.max(0, Math.floor(fields.durationSeconds ?? 0)),
    rawPubDate: fields.rawPubDate || undefined,
  });
}
