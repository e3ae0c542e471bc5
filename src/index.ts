export * from './types';
export * from './errors';
export type { ScanConfig } from './config';
export { loadScanConfig, validateScanConfig, parseThresholdTriples, parseVenueFees } from './config';

export * from './matching/types';
export { TextNormalizer, textNormalizer } from './matching/textNormalizer';
export { jaccardSimilarity, stringSimilarity } from './matching/similarity';
export { QueryStrategyGenerator, strategyPrior, strategyPriority } from './matching/strategies';
export { MatchScorer } from './matching/matchScorer';
export { validateMarket, partitionMarkets } from './matching/marketValidator';
export { MatchingEngine } from './matching/matchingEngine';

export * from './arbitrage/types';
export { SlippageModel, slippageModel } from './arbitrage/slippageModel';
export { ArbitrageCalculator, sidePrice } from './arbitrage/arbitrageCalculator';
export type { ScannerOptions } from './arbitrage/scanner';
export { ArbitrageScanner, rankOpportunities, actionable } from './arbitrage/scanner';

export * from './odds/types';
export { segmentEvent, segmentHistory, partitionObservations } from './odds/sequenceSegmenter';
export { evaluateSequence, analyzeProgressions, validateTriple, validateTriples } from './odds/thresholdProgression';
export { OddsSequenceAnalyzer } from './odds/oddsSequenceAnalyzer';
export { loadOddsHistory, parseOddsCsv } from './odds/historyLoader';

export type { MarketSource, ContractSource } from './sources/types';
export { GammaMarketSource, toMarketQuestion } from './sources/gammaMarketSource';
export { SnapshotFileSource, ContractFileSource, listSnapshotVenues } from './sources/snapshotFileSource';
export type { Database, Queryable } from './database/client';
export { DatabaseClient } from './database/client';
export { ScanRepository } from './database/scanRepository';
export { TelegramNotifier, formatOpportunity } from './services/telegramNotifier';
