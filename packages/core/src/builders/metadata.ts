import {
  RISK_PROFILES,
  TIME_HORIZONS,
  type Metadata,
} from '../types/publication';
import type { BuildContext } from './context';

const MIN_TAGS = 1;
const MAX_TAGS = 100;

/**
 * Fresh metadata record. Every call draws its own risk profile, horizon and
 * tag subset; records are never shared between entities.
 */
export function buildMetadata(ctx: BuildContext): Metadata {
  const { random, termBank } = ctx;
  return {
    assetClasses: [...termBank.assetClasses],
    companies: [...termBank.companies],
    instruments: [...termBank.instruments],
    sectors: [...termBank.sectors],
    regions: [...termBank.regions],
    riskProfile: random.pick(RISK_PROFILES),
    timeHorizon: random.pick(TIME_HORIZONS),
    tags: random.sample(termBank.tags, random.int(MIN_TAGS, MAX_TAGS)),
  };
}
