export interface PageInfo {
  limit: number;
  nextCursor?: string;
}
