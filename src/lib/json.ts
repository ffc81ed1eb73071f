/**
 * 解析上游回應文字；空字串或非 JSON 時回傳 undefined
 */
export function parseJson(text: string): unknown {
  if (text.trim().length === 0) {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch {
    // 非 JSON 內容交由呼叫端以原始文字處理
    return undefined;
  }
}
