/**
 * Cluster Topology Extractor
 *
 * `sysctl -n hw.perflevel1.logicalcpu` prints the number of efficiency cores
 * on Apple Silicon.
 */

import type { ClusterTopology, ExtractionResult } from '../types/index.js';

export function extractEfficiencyCoreCount(text: string): ExtractionResult<ClusterTopology> {
  const trimmed = text.trim();
  if (!/^\d+$/.test(trimmed)) {
    return { kind: 'mismatch', reason: `unexpected perflevel output: ${trimmed.slice(0, 40)}` };
  }
  return { kind: 'facts', facts: { efficiencyCoreCount: Number.parseInt(trimmed, 10) } };
}
