/**
 * Cascade Risk Analyzer
 *
 * Propagates the deficiency of failing services to their dependents along a
 * static dependency graph.
 *
 * For each origin scoring below the health threshold, deficiency = 1 - score.
 * A dependent reached by a path of edges e1..ek receives
 * deficiency * w(e1) * ... * w(ek). Within one origin the strongest path counts;
 * contributions from different origins are summed and clamped to [0, 1].
 * Traversal stops after maxDepth edges, so cyclic graphs terminate.
 */

import type { CascadeRisk, DependencyEdge, RegionHealth, RegionId, ServiceId } from '@regionguard/types';
import type { ILogger } from '../logging';
import { createLogger } from '../logging';
import { clamp01 } from '../health/scoring';

export interface CascadeAnalyzerConfig {
  edges: readonly DependencyEdge[];
  healthThreshold: number;
  /** Maximum number of hops followed from an origin (default: 3) */
  maxDepth?: number;
  logger?: ILogger;
}

interface Contribution {
  risk: number;
  origins: Map<ServiceId, number>;
}

export class CascadeRiskAnalyzer {
  private readonly downstream = new Map<ServiceId, DependencyEdge[]>();
  private readonly maxDepth: number;
  private readonly logger: ILogger;

  constructor(private readonly config: CascadeAnalyzerConfig) {
    this.maxDepth = config.maxDepth ?? 3;
    this.logger = config.logger ?? createLogger('cascade-analyzer');

    for (const edge of config.edges) {
      const list = this.downstream.get(edge.upstream) ?? [];
      list.push(edge);
      this.downstream.set(edge.upstream, list);
    }
  }

  /**
   * Risk per affected service in the region, highest first.
   */
  assess(region: RegionId, health: RegionHealth): CascadeRisk[] {
    const byService = new Map<ServiceId, Contribution>();

    for (const component of Object.values(health.components)) {
      if (component.score >= this.config.healthThreshold) continue;

      const reach = this.strongestPaths(component.service, 1 - component.score);
      for (const [affected, risk] of reach) {
        const entry = byService.get(affected) ?? { risk: 0, origins: new Map<ServiceId, number>() };
        entry.risk += risk;
        entry.origins.set(component.service, risk);
        byService.set(affected, entry);
      }
    }

    const risks: CascadeRisk[] = [];
    for (const [affected, entry] of byService) {
      const contributors = [...entry.origins.entries()].sort((a, b) => b[1] - a[1]);
      risks.push(Object.freeze({
        region,
        originatingService: contributors[0][0],
        affectedService: affected,
        riskScore: clamp01(entry.risk),
        contributors: Object.freeze(contributors.map(([service]) => service)),
      }));
    }
    risks.sort((a, b) => b.riskScore - a.riskScore || a.affectedService.localeCompare(b.affectedService));

    if (risks.length > 0) {
      this.logger.debug('Cascade risk assessed', {
        region,
        aggregate: aggregateRisk(risks),
        affected: risks.length,
      });
    }
    return risks;
  }

  /**
   * Depth-capped DFS from one origin. Returns the maximum path product
   * for every dependent reachable within maxDepth hops.
   */
  private strongestPaths(origin: ServiceId, deficiency: number): Map<ServiceId, number> {
    const best = new Map<ServiceId, number>();

    const visit = (service: ServiceId, carried: number, depth: number): void => {
      if (depth >= this.maxDepth) return;
      for (const edge of this.downstream.get(service) ?? []) {
        const risk = carried * edge.weight;
        if (edge.downstream !== origin && risk > (best.get(edge.downstream) ?? 0)) {
          best.set(edge.downstream, risk);
        }
        visit(edge.downstream, risk, depth + 1);
      }
    };

    visit(origin, deficiency, 0);
    return best;
  }
}

/**
 * Region-level cascade risk: the worst single dependent (0 when none).
 */
export function aggregateRisk(risks: readonly CascadeRisk[]): number {
  return risks.reduce((max, risk) => Math.max(max, risk.riskScore), 0);
}
