/** 簡易 token 估算比例（1 token ≈ 4 字元） */
export const CHARS_PER_TOKEN = 4;

export function estimateTokens(text: string): number {
  return Math.floor(text.length / CHARS_PER_TOKEN);
}
