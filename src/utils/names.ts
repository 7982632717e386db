function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * 人物・番組名として書かれた値を文字列にそろえる
 *
 * JSON-LD の Person（`{ name }`）やその配列、Atom の `<author><name>` のような入れ子も受け付ける。
 * 配列は先頭の要素だけを見る。名前が取れなければ空文字
 */
export function displayName(value: unknown): string {
  if (typeof value === 'string') {
    return value.trim();
  }
  if (Array.isArray(value)) {
    return value.length > 0 ? displayName(value[0]) : '';
  }
  if (isRecord(value) && 'name' in value) {
    return displayName(value.name);
  }
  return '';
}
