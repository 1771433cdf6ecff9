// tests/application/agentRegistry.application.test.ts

/**
 * AgentRegistry application tests.
 *
 * Purpose:
 * - register / find / unregister round trips
 * - capability lookups in registration order
 * - overwrite semantics and bulk loading that never throws
 */

import { AgentRegistry, type AgentSource } from '../../src/delegation/application/AgentRegistry';
import { AgentNotFoundError } from '../../src/delegation/domain/Errors';
import { AgentDescriptorValidationError } from '../../src/delegation/dto/AgentDescriptorDto';
import { makeDescriptor, silentLogger } from '../helpers/fakes';

function sourceOf(entries: unknown[], issues: string[] = []): AgentSource {
  return { description: 'test:inline', read: () => ({ entries, issues }) };
}

describe('AgentRegistry', () => {
  let registry: AgentRegistry;

  beforeEach(() => {
    registry = new AgentRegistry(silentLogger);
  });

  it('findByName returns exactly the registered descriptor, and null after unregister', () => {
    const billing = makeDescriptor('billing_agent', ['billing']);
    registry.register(billing);

    expect(registry.findByName('billing_agent')).toBe(billing);

    expect(registry.unregister('billing_agent')).toBe(true);
    expect(registry.findByName('billing_agent')).toBeNull();
  });

  it('looks names up case-insensitively', () => {
    const billing = makeDescriptor('Billing_Agent');
    registry.register(billing);

    expect(registry.findByName('billing_agent')).toBe(billing);
    expect(registry.has('BILLING_AGENT')).toBe(true);
  });

  it('unregister is idempotent', () => {
    expect(registry.unregister('missing')).toBe(false);
    expect(registry.size).toBe(0);
  });

  it('requireByName throws AgentNotFoundError for unknown names', () => {
    expect(() => registry.requireByName('ghost')).toThrow(AgentNotFoundError);
  });

  it('findByCapability returns every provider in registration order', () => {
    const a = makeDescriptor('agent_a', ['weather', 'forecast']);
    const b = makeDescriptor('agent_b', ['insurance']);
    const c = makeDescriptor('agent_c', ['Weather']);
    registry.register(a);
    registry.register(b);
    registry.register(c);

    expect(registry.findByCapability('weather').map((d) => d.name)).toEqual(['agent_a', 'agent_c']);
    expect(registry.findByCapability('unknown')).toEqual([]);
  });

  it('registering the same name twice leaves one entry, the last write, in the original position', () => {
    registry.register(makeDescriptor('first', ['x']));
    registry.register(makeDescriptor('second', ['x']));
    const replacement = makeDescriptor('first', ['y'], { endpoint: 'http://agents.test/v2' });
    registry.register(replacement);

    expect(registry.size).toBe(2);
    expect(registry.list().map((d) => d.name)).toEqual(['first', 'second']);
    expect(registry.findByName('first')).toBe(replacement);
    expect(registry.findByCapability('x').map((d) => d.name)).toEqual(['second']);
    expect(registry.findByCapability('y').map((d) => d.name)).toEqual(['first']);
  });

  it('resolve tries the name first, then the first capability match', () => {
    registry.register(makeDescriptor('weather', ['forecast']));
    registry.register(makeDescriptor('meteo', ['weather']));

    expect(registry.resolve('weather')?.name).toBe('weather');
    expect(registry.resolve('forecast')?.name).toBe('weather');
    expect(registry.resolve('nothing')).toBeNull();
  });

  it('listCapabilities is sorted and unique', () => {
    registry.register(makeDescriptor('a', ['zeta', 'alpha']));
    registry.register(makeDescriptor('b', ['alpha', 'mid']));

    expect(registry.listCapabilities()).toEqual(['alpha', 'mid', 'zeta']);
  });

  it('rejects descriptors with a non-http endpoint', () => {
    expect(() => registry.register(makeDescriptor('ftp', [], { endpoint: 'ftp://agents.test' }))).toThrow(
      AgentDescriptorValidationError,
    );
    expect(registry.size).toBe(0);
  });

  it('loadFromSource skips malformed entries and reports them', () => {
    const report = registry.loadFromSource(
      sourceOf([
        { name: 'good', endpoint: 'http://agents.test/good', capabilities: ['a'] },
        { name: '', endpoint: 'http://agents.test/x' },
        'not-an-object',
        { name: 'legacy', url: 'http://agents.test/legacy', capabilities: 'b, c' },
      ]),
    );

    expect(report.loaded).toEqual(['good', 'legacy']);
    expect(report.skipped.map((s) => s.index)).toEqual([1, 2]);
    expect(report.skipped[0].issues).toEqual(['"name" must be a non-empty string.']);
    expect(registry.findByCapability('c').map((d) => d.name)).toEqual(['legacy']);
  });

  it('loadFromSource never throws when the source itself fails', () => {
    const broken: AgentSource = {
      description: 'test:broken',
      read: () => {
        throw new Error('disk on fire');
      },
    };

    const report = registry.loadFromSource(broken);

    expect(report).toEqual({
      source: 'test:broken',
      loaded: [],
      skipped: [{ index: null, issues: ['disk on fire'] }],
    });
  });

  it('loadFromSource surfaces source-level issues as a skipped entry', () => {
    const report = registry.loadFromSource(sourceOf([], ['File not found: /nope.json']));

    expect(report.skipped).toEqual([{ index: null, issues: ['File not found: /nope.json'] }]);
  });
});
