/**
 * Maps a node address, as the cluster knows it, to the infrastructure unit
 * (container) that hosts it.
 *
 * Cluster-internal and infrastructure-level address spaces need not align,
 * so two strategies run in fixed order and the first match wins:
 *
 * 1. `direct`: probe each unit's current address, in the caller's order,
 *    and test it against the target with three rules in turn: exact,
 *    target contained in the unit address, unit address contained in the
 *    target. The first unit satisfying any rule wins, so an earlier loose
 *    match beats a later exact one.
 * 2. `topology`: find the node whose primary or broadcast address equals
 *    the target, then pick the first unit whose address equals one of that
 *    node's addresses exactly.
 *
 * Each unit is probed at most once per call. Nothing is cached between
 * calls, so a restarted container's new address is always picked up.
 *
 * @module ownership/infrastructure-mapper
 */

import type {
  Address,
  ClusterTopologySnapshot,
  InfrastructureControl,
  InfrastructureUnit,
} from '../core/types.js';
import type { Logger } from '../core/logger.js';

// =============================================================================
// Types
// =============================================================================

export type MatchRule = 'exact' | 'target_in_unit' | 'unit_in_target';

export type MappingStrategy = 'direct' | 'topology';

/**
 * What probing one unit returned. `address` is null when the unit had no
 * address or the probe failed.
 */
export interface UnitProbe {
  readonly unit: InfrastructureUnit;
  readonly address: Address | null;
}

export interface ResolvedMapping {
  readonly resolved: true;
  readonly unit: InfrastructureUnit;
  readonly unitAddress: Address;
  readonly strategy: MappingStrategy;
  readonly rule: MatchRule;
}

export interface UnresolvedMapping {
  readonly resolved: false;
  readonly target: Address;

  /** Every unit probed, with the address it reported, for diagnosis */
  readonly probes: readonly UnitProbe[];
}

/**
 * Result of a mapping. Unresolved is an ordinary outcome the caller must
 * check for, not an error.
 */
export type MappingResult = ResolvedMapping | UnresolvedMapping;

// =============================================================================
// Matching
// =============================================================================

/**
 * Applies the direct-probe rules in order and returns the first that holds.
 */
export function matchAddress(target: Address, unitAddress: Address): MatchRule | null {
  if (unitAddress === target) {
    return 'exact';
  }
  if (unitAddress.includes(target)) {
    return 'target_in_unit';
  }
  if (target.includes(unitAddress)) {
    return 'unit_in_target';
  }
  return null;
}

// =============================================================================
// InfrastructureMapper
// =============================================================================

export class InfrastructureMapper {
  private readonly control: InfrastructureControl;
  private readonly logger: Logger;

  constructor(control: InfrastructureControl, logger: Logger) {
    this.control = control;
    this.logger = logger.child('infrastructure-mapper');
  }

  /**
   * Finds the unit hosting the node at `target`.
   *
   * @param target - Node address as reported by the cluster
   * @param units - Candidate units; list order is match priority
   * @param snapshot - Topology used by the cross-reference fallback
   */
  async map(
    target: Address,
    units: readonly InfrastructureUnit[],
    snapshot?: ClusterTopologySnapshot,
  ): Promise<MappingResult> {
    this.logger.info('Mapping replica node to infrastructure unit', { target, units });

    const probes: UnitProbe[] = [];

    for (const unit of units) {
      const address = await this.probe(unit);
      probes.push({ unit, address });
      if (address === null || address === '') {
        continue;
      }

      const rule = matchAddress(target, address);
      if (rule !== null) {
        this.logger.info('Matched unit by direct address probe', { unit, address, rule });
        return { resolved: true, unit, unitAddress: address, strategy: 'direct', rule };
      }
    }

    if (snapshot !== undefined) {
      const fallback = this.matchThroughTopology(target, probes, snapshot);
      if (fallback !== null) {
        return fallback;
      }
    }

    this.logger.warn('No infrastructure unit matches node address', {
      target,
      probes: probes.map((p) => ({ unit: p.unit, address: p.address })),
    });
    return { resolved: false, target, probes };
  }

  private async probe(unit: InfrastructureUnit): Promise<Address | null> {
    try {
      const address = await this.control.currentAddress(unit);
      this.logger.debug('Probed unit address', { unit, address });
      return address;
    } catch (error) {
      this.logger.warn('Could not determine unit address, skipping', {
        unit,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  private matchThroughTopology(
    target: Address,
    probes: readonly UnitProbe[],
    snapshot: ClusterTopologySnapshot,
  ): ResolvedMapping | null {
    this.logger.info('Trying topology cross-reference', { target });

    const node = snapshot.nodes.find(
      (n) => n.primaryAddress === target || n.broadcastAddress === target,
    );
    if (node === undefined) {
      return null;
    }

    const candidates: Address[] = [node.primaryAddress];
    if (node.broadcastAddress !== undefined) {
      candidates.push(node.broadcastAddress);
    }

    for (const { unit, address } of probes) {
      if (address !== null && candidates.includes(address)) {
        this.logger.info('Matched unit through topology', {
          unit,
          address,
          primaryAddress: node.primaryAddress,
          broadcastAddress: node.broadcastAddress,
        });
        return { resolved: true, unit, unitAddress: address, strategy: 'topology', rule: 'exact' };
      }
    }

    return null;
  }
}
