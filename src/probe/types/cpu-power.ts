/**
 * CPU Power Domain Record
 */

export interface CpuPowerRecord {
  /** Mean active residency of the efficiency cluster (0-100) */
  eClusterActive: number;
  /** Mean active residency of the performance cluster (0-100) */
  pClusterActive: number;
  eClusterFreqMhz: number;
  pClusterFreqMhz: number;
  aneWatts: number;
  cpuWatts: number;
  gpuWatts: number;
  /** Combined CPU + GPU + ANE package power */
  packageWatts: number;
}

export type CpuPowerFacts = Partial<CpuPowerRecord>;

export interface ClusterTopology {
  /** Cores with an index below this count belong to the efficiency cluster */
  efficiencyCoreCount: number;
}

export function createDefaultCpuPowerRecord(): CpuPowerRecord {
  return {
    eClusterActive: 0,
    pClusterActive: 0,
    eClusterFreqMhz: 0,
    pClusterFreqMhz: 0,
    aneWatts: 0,
    cpuWatts: 0,
    gpuWatts: 0,
    packageWatts: 0,
  };
}
