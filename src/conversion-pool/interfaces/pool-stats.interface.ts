export type { ConversionPoolStats as PoolStats } from '../../application/ports/output/conversion-pool.port';

export interface SlotStats {
  slotId: number;
  isActive: boolean;
  currentJobId?: string;
  jobsCompleted: number;
  jobsFailed: number;
  lastActivityAt: Date;
}
