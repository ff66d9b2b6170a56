import { TableError } from '../../../../util/errors.js';
import { seededRNG } from '../../../../util/rng.js';
import { createProvider, type InferenceClient } from '../index.js';

const deps = { decks: 2, rng: seededRNG(1) };
const client: InferenceClient = { model: 'test-model', complete: async () => '{}' };

describe('createProvider', () => {
  test('builds the provider each seat type names', () => {
    expect(createProvider({ type: 'basic', name: 'b', chips: 100 }, deps).kind).toBe('basic');
    expect(createProvider({ type: 'naive', name: 'n', chips: 100 }, deps).kind).toBe('naive');
    expect(createProvider({ type: 'scripted', name: 's', chips: 100, script: {} }, deps).kind).toBe('scripted');
    expect(createProvider({ type: 'human', name: 'h', chips: 100 }, { ...deps, prompter: async () => '' }).kind).toBe('human');
    expect(createProvider({ type: 'llm', name: 'l', chips: 100 }, { ...deps, inference: () => client }).kind).toBe('llm');
  });

  test('seats that cannot be served are a table error', () => {
    expect(() => createProvider({ type: 'human', name: 'h', chips: 100 }, deps)).toThrow(TableError);
    expect(() => createProvider({ type: 'llm', name: 'l', chips: 100 }, { ...deps, inference: () => null })).toThrow(TableError);
  });

  test('llm seats ask for their own model', () => {
    const asked: Array<string | undefined> = [];
    createProvider({ type: 'llm', name: 'l', chips: 100, model: 'other-model' }, {
      ...deps,
      inference: (model) => {
        asked.push(model);
        return client;
      },
    });
    expect(asked).toEqual(['other-model']);
  });
});
