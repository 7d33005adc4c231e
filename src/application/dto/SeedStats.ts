/** 示範資料寫入統計 */
export interface SeedStats {
  pointsUpserted: number;
  batches: number;
  embeddingTokens: number;
  recreated: boolean;
  durationMs: number;
}
