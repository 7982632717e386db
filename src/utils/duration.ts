// 再生時間の表記ゆれを秒数に正規化する
//   ISO 8601形式: PT40M43S, PT1H2M3S, PT123M35S
//   時計形式: 40:43, 1:23:35
//   整数のみ: 2443

const DIGITS = /^\d+$/;

export function parseDuration(raw: string | number | null | undefined): number {
  if (raw === null || raw === undefined) {
    return 0;
  }

  if (typeof raw === 'number') {
    return Number.isFinite(raw) && raw > 0 ? Math.floor(raw) : 0;
  }

  const value = raw.trim();
  if (!value) {
    return 0;
  }

  if (value.startsWith('PT')) {
    return parseIsoDuration(value);
  }

  const parts = value.split(':').map((p) => p.trim());
  if (parts.length > 3 || !parts.every((p) => DIGITS.test(p))) {
    return 0;
  }

  const [a = 0, b = 0, c = 0] = parts.map((p) => parseInt(p, 10));
  switch (parts.length) {
    case 3:
      return a * 3600 + b * 60 + c;
    case 2:
      return a * 60 + b;
    default:
      return a;
  }
}

// H → M → S の順に読む（文字列中の並び順は問わない）
function parseIsoDuration(value: string): number {
  const body = value.slice(2);
  const hours = body.match(/(\d+)H/);
  const minutes = body.match(/(\d+)M/);
  const seconds = body.match(/(\d+)S/);

  let total = 0;
  if (hours) total += parseInt(hours[1] ?? '0', 10) * 3600;
  if (minutes) total += parseInt(minutes[1] ?? '0', 10) * 60;
  if (seconds) total += parseInt(seconds[1] ?? '0', 10);
  return total;
}

// 秒数を M:SS / H:MM:SS 形式に変換
export function formatDuration(seconds: number): string {
  if (!seconds || seconds < 0) {
    return '00:00';
  }

  const totalMinutes = Math.floor(seconds / 60);
  const secs = Math.floor(seconds % 60);
  const pad = (n: number) => n.toString().padStart(2, '0');

  if (totalMinutes >= 60) {
    const hours = Math.floor(totalMinutes / 60);
    return `${hours}:${pad(totalMinutes % 60)}:${pad(secs)}`;
  }
  return `${totalMinutes}:${pad(secs)}`;
}

// 累計再生時間の表示（1時間以上は "2h 5m"、未満は "45m"）
export function formatListeningTime(seconds: number): string {
  const total = Number.isFinite(seconds) && seconds > 0 ? Math.floor(seconds) : 0;
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  return hours > 0 ? `${hours}h ${minutes}m` : `${minutes}m`;
}
