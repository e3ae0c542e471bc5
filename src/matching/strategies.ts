/**
 * Query Strategy Generator
 * Produces candidate phrasings that could match a contract name to a market
 * question. Each strategy is one entry of the dispatch table below; adding a
 * strategy means adding an id to STRATEGY_IDS and its entry here.
 */

import { ContractSide, MarketQuestion } from '../types';
import {
  DEFAULT_MATCHING_OPTIONS,
  MatchingOptions,
  QueryCandidate,
  STRATEGY_IDS,
  StrategyContext,
  StrategyId,
} from './types';
import { TextNormalizer, textNormalizer } from './textNormalizer';
import { stringSimilarity } from './similarity';
import lexicon from './lexicon.json';

export type GeneratorOptions = Pick<MatchingOptions, 'markerWords' | 'domainSuffix' | 'bridgeSimilarityCutoff'>;

interface StrategyEnv {
  normalizer: TextNormalizer;
  options: GeneratorOptions;
  markerPatterns: RegExp[];
  domainTriggers: string[];
  contractTokens: Set<string>;
  contractKeyTerms: string[];
}

interface StrategyDefinition {
  prior: number;
  build: (contract: ContractSide, context: StrategyContext, env: StrategyEnv) => string | null;
}

const WIN_WORD = /\bwin/i;

const STRATEGIES: Record<StrategyId, StrategyDefinition> = {
  original_pattern: {
    prior: 0.9,
    build: (contract, context, env) => {
      if (env.normalizer.normalizeText(context.text) === env.normalizer.normalizeText(contract.name)) {
        return null;
      }
      const index = findMarker(context.text, env.markerPatterns);
      if (index < 0) return null;
      return `Will ${contract.name} ${context.text.slice(index).trim()}`;
    },
  },

  direct_name: {
    prior: 0.8,
    build: (contract, context, env) => {
      if (env.contractTokens.size === 0 || context.tokens.size === 0) return null;
      const isSubset = isSubsetOf(env.contractTokens, context.tokens);
      const isSuperset = isSubsetOf(context.tokens, env.contractTokens);
      return isSubset || isSuperset ? contract.name : null;
    },
  },

  constructed_win: {
    prior: 0.75,
    build: (contract, context) => {
      if (WIN_WORD.test(context.text) || context.keyTerms.length === 0) return null;
      return `Will ${contract.name} win ${context.keyTerms.slice(0, 3).join(' ')}`;
    },
  },

  domain_pattern_1: {
    prior: 0.7,
    build: (contract, context) => templated(`Will ${contract.name} win the`, eventPhrase(context.text)),
  },

  domain_pattern_2: {
    prior: 0.65,
    build: (contract, context) => templated(`${contract.name} to win`, eventPhrase(context.text)),
  },

  domain_pattern_3: {
    prior: 0.6,
    build: (contract) => templated(`Will ${contract.name} be elected`),
  },

  domain_pattern_4: {
    prior: 0.55,
    build: (contract, context) => templated(contract.name, eventPhrase(context.text)),
  },

  fuzzy_reconstruction: {
    prior: 0.65,
    build: (_contract, context, env) => {
      if (env.contractKeyTerms.length === 0 || context.keyTerms.length === 0) return null;
      const combined = [...env.contractKeyTerms.slice(0, 2), ...context.keyTerms.slice(0, 2)];
      return `Will ${combined.join(' ')}`;
    },
  },

  simple_fallback: {
    prior: 0.6,
    build: (contract, context, env) => {
      const mentionsDomain = env.domainTriggers.some(term => context.tokens.has(term));
      return mentionsDomain ? `${contract.name} ${env.options.domainSuffix}` : null;
    },
  },

  similarity_bridge: {
    prior: 0.55,
    build: (contract, context, env) => {
      const similarity = stringSimilarity(
        env.normalizer.normalizeText(contract.name),
        env.normalizer.normalizeText(context.text)
      );
      return similarity < env.options.bridgeSimilarityCutoff ? `Will ${contract.name} win` : null;
    },
  },
};

export function strategyPrior(id: StrategyId): number {
  return STRATEGIES[id].prior;
}

/**
 * Position of a strategy in the fixed priority order; lower wins ties
 */
export function strategyPriority(id: StrategyId): number {
  return STRATEGY_IDS.indexOf(id);
}

export class QueryStrategyGenerator {
  private readonly options: GeneratorOptions;
  private readonly markerPatterns: RegExp[];

  constructor(
    options?: Partial<GeneratorOptions>,
    private readonly normalizer: TextNormalizer = textNormalizer,
    private readonly domainTriggers: string[] = lexicon.domainTriggers
  ) {
    this.options = {
      markerWords: options?.markerWords ?? DEFAULT_MATCHING_OPTIONS.markerWords,
      domainSuffix: options?.domainSuffix ?? DEFAULT_MATCHING_OPTIONS.domainSuffix,
      bridgeSimilarityCutoff: options?.bridgeSimilarityCutoff ?? DEFAULT_MATCHING_OPTIONS.bridgeSimilarityCutoff,
    };
    this.markerPatterns = this.options.markerWords.map(markerPattern);
  }

  /**
   * All candidates for a contract against every market in the pool (and the
   * contract's own market title), highest prior first
   */
  generateCandidates(contract: ContractSide, marketPool: readonly MarketQuestion[]): QueryCandidate[] {
    const contexts: string[] = [];
    if (contract.marketTitle && contract.marketTitle.trim()) {
      contexts.push(contract.marketTitle);
    }
    contexts.push(...marketPool.map(m => m.question));

    const env = this.createEnv(contract);
    const seen = new Set<string>();
    const candidates: QueryCandidate[] = [];

    for (const text of contexts) {
      const context = this.buildContext(text);
      for (const id of STRATEGY_IDS) {
        const candidate = this.evaluate(id, contract, context, env);
        if (!candidate) continue;

        const key = `${id}|${candidate.text}`;
        if (seen.has(key)) continue;
        seen.add(key);
        candidates.push(candidate);
      }
    }

    return candidates.sort(
      (a, b) => b.priorConfidence - a.priorConfidence || strategyPriority(a.strategyId) - strategyPriority(b.strategyId)
    );
  }

  /**
   * Run a single strategy against a single context text
   */
  applyStrategy(id: StrategyId, contract: ContractSide, contextText: string): QueryCandidate | null {
    return this.evaluate(id, contract, this.buildContext(contextText), this.createEnv(contract));
  }

  buildContext(text: string): StrategyContext {
    return {
      text,
      tokens: this.normalizer.normalize(text),
      keyTerms: this.normalizer.extractKeyTerms(text),
    };
  }

  private evaluate(
    id: StrategyId,
    contract: ContractSide,
    context: StrategyContext,
    env: StrategyEnv
  ): QueryCandidate | null {
    const strategy = STRATEGIES[id];
    const text = strategy.build(contract, context, env);
    if (text === null) return null;

    const clean = text.replace(/\s+/g, ' ').trim();
    if (!clean) return null;

    return Object.freeze({ text: clean, strategyId: id, priorConfidence: strategy.prior });
  }

  private createEnv(contract: ContractSide): StrategyEnv {
    return {
      normalizer: this.normalizer,
      options: this.options,
      markerPatterns: this.markerPatterns,
      domainTriggers: this.domainTriggers,
      contractTokens: this.normalizer.normalize(contract.name),
      contractKeyTerms: this.normalizer.extractKeyTerms(contract.name),
    };
  }
}

/**
 * Strip the interrogative frame from a question:
 * "Who will win the 2024 election?" -> "win the 2024 election"
 */
export function eventPhrase(text: string): string {
  return text
    .trim()
    .replace(/[?.!]+$/, '')
    .replace(/^(?:who|which\s+\S+)\s+will\s+/i, '')
    .replace(/^will\s+/i, '')
    .trim();
}

// Templates shorter than three words carry too little to match on
function templated(prefix: string, phrase?: string): string | null {
  if (phrase !== undefined && !phrase) return null;
  const text = `${prefix} ${phrase ?? ''}`.replace(/\s+/g, ' ').trim();
  return text.split(' ').length >= 3 ? text : null;
}

function findMarker(text: string, patterns: RegExp[]): number {
  let earliest = -1;
  for (const pattern of patterns) {
    const match = pattern.exec(text);
    if (match && (earliest < 0 || match.index < earliest)) {
      earliest = match.index;
    }
  }
  return earliest;
}

function markerPattern(marker: string): RegExp {
  const escaped = marker
    .trim()
    .replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
    .replace(/\s+/g, '\\s+');
  return new RegExp(`\\b${escaped}`, 'i');
}

function isSubsetOf<T>(subset: Set<T>, superset: Set<T>): boolean {
  for (const item of subset) {
    if (!superset.has(item)) return false;
  }
  return true;
}
