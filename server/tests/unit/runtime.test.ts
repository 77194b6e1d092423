import { describe, it, expect } from 'vitest';
import { createNegotiationRuntime, definePolicy, loadConfig, silentLogger } from '../../index';
import { ACCOUNT_ID, ScriptedGenerator, seedRepository } from '../helpers/fixtures';

describe('createNegotiationRuntime', () => {
  it('wires an in-memory runtime when no database is configured', async () => {
    const repository = await seedRepository();
    const runtime = createNegotiationRuntime({
      generator: new ScriptedGenerator(),
      config: { ...loadConfig({}), policy: definePolicy({ prohibitedContactDays: [] }) },
      logger: silentLogger(),
      repository
    });

    expect(await runtime.healthy()).toBe(true);
    expect(runtime.service.policy().prohibitedContactDays).toEqual([]);
    expect(await runtime.service.listAccountConversations(ACCOUNT_ID)).toEqual([]);

    await runtime.close();
    expect(runtime.audit.publish({ eventType: 'late', severity: 'info', passed: true, description: 'after close' })).toBe(false);
  });
});
