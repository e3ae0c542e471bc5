import { ContractSide, MarketQuestion, VenueId } from '../types';

/**
 * Anything that can hand the scanner one venue's market snapshot
 */
export interface MarketSource {
  readonly venue: VenueId;
  fetchMarkets(): Promise<MarketQuestion[]>;
}

export interface ContractSource {
  loadContracts(): Promise<ContractSide[]>;
}
