import type { SeatConfig } from '../../../config/seats.js';
import { TableError } from '../../../util/errors.js';
import type { RNG } from '../../../util/rng.js';
import { BasicStrategyProvider } from './basicStrategy.js';
import { HumanProvider, type Prompter } from './human.js';
import { InferenceProvider, type InferenceClient } from './inference.js';
import { NaiveProvider } from './naive.js';
import { ScriptedProvider } from './scripted.js';
import type { DecisionProvider } from './types.js';

export type { DecisionProvider } from './types.js';
export { BasicStrategyProvider } from './basicStrategy.js';
export { HumanProvider, createReadlinePrompter, type Prompter } from './human.js';
export { InferenceProvider, type InferenceClient, type ChatMessage } from './inference.js';
export { NaiveProvider } from './naive.js';
export { ScriptedProvider, type Script } from './scripted.js';

export interface ProviderDeps {
  decks: number;
  rng: RNG;
  prompter?: Prompter;
  /** Resolves a client for a seat's model; null when no API key is configured. */
  inference?: (model?: string) => InferenceClient | null;
}

export function createProvider(seat: SeatConfig, deps: ProviderDeps): DecisionProvider {
  switch (seat.type) {
    case 'basic':
      return new BasicStrategyProvider(deps.decks);
    case 'naive':
      return new NaiveProvider(deps.rng);
    case 'scripted':
      return new ScriptedProvider(seat.script);
    case 'human': {
      if (!deps.prompter) throw new TableError(`seat ${seat.name} is human but no terminal prompt is available`);
      return new HumanProvider(seat.name, deps.prompter);
    }
    case 'llm': {
      const client = deps.inference?.(seat.model) ?? null;
      if (!client) throw new TableError(`seat ${seat.name} needs an inference client (set OPENAI_API_KEY)`);
      return new InferenceProvider(seat.name, client);
    }
  }
}
