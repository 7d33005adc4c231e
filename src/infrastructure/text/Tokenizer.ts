/** 小寫化後以非字母數字切詞（支援 Unicode 字母，如 é、ü） */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((t) => t.length > 0);
}

/** 32-bit FNV-1a hash */
export function fnv1a(input: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

/** 字元 n-gram，前後補空白以保留詞首詞尾資訊 */
export function charNgrams(token: string, n: number): string[] {
  const padded = ` ${token} `;
  if (padded.length <= n) return [padded];
  const grams: string[] = [];
  for (let i = 0; i + n <= padded.length; i++) {
    grams.push(padded.slice(i, i + n));
  }
  return grams;
}
