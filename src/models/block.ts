/**
 * Block interfaces - a named group of files shipped to the catalog as one unit
 */

export const BLOCK_STATUSES = ['OPEN', 'CLOSED', 'UPLOADED'] as const;

export type BlockStatus = (typeof BLOCK_STATUSES)[number];

export interface BlockInfo {
  id: number;
  name: string;
  status: BlockStatus;
  locations: string[];
  file_count: number;
  created_at: string;
}
