import { describe, expect, it } from 'vitest';
import { MessageCreatedEvent } from '../src/types';
import { createEngineHarness } from './engine-harness';
import { GUILD_ID } from './fakes';

const SPAMMER = '300000000000000001';
const TRUSTED = '200000000000000001';

function inviteMessage(messageId: string, overrides: Partial<MessageCreatedEvent> = {}): MessageCreatedEvent {
  return {
    type: 'message_created',
    communityId: GUILD_ID,
    channelId: 'chan-1',
    messageId,
    authorId: SPAMMER,
    authorIsBot: false,
    content: 'join us https://discord.gg/abc123',
    ...overrides,
  };
}

describe('moderation engine invite spam', () => {
  it('deletes every invite and times out the author on the fifth one inside the window', async () => {
    const start = 1_700_000_000_000;
    const harness = createEngineHarness({ members: [SPAMMER], nowTs: start });

    for (let i = 0; i < 5; i += 1) {
      if (i > 0) harness.clock.advance(2_000);
      await harness.engine.dispatch(inviteMessage(`msg-${i + 1}`));
    }

    expect(harness.gateway.callsOf('deleteMessage')).toEqual([
      ['msg-1'],
      ['msg-2'],
      ['msg-3'],
      ['msg-4'],
      ['msg-5'],
    ]);
    expect(harness.gateway.callsOf('timeoutMember')).toEqual([
      [SPAMMER, start + 8_000 + 3_600_000, 'Invite-Spam: ≥5 in 15s'],
    ]);
    expect(harness.gateway.callsOf('kickMember')).toEqual([]);
    expect(harness.logger.info).toHaveBeenCalledWith('Invite spam threshold crossed', {
      guildId: GUILD_ID,
      userId: SPAMMER,
      outcome: 'timed_out',
    });
    expect(harness.repos.moderationActions.summarizeSince(0)).toEqual([
      { action: 'delete_message', count: 5 },
      { action: 'timeout', count: 1 },
    ]);

    harness.db.close();
  });

  it('kicks the author when the timeout is refused', async () => {
    const harness = createEngineHarness({ members: [SPAMMER] });
    harness.gateway.failures.set('timeoutMember', () => Object.assign(new Error('Missing Permissions'), { status: 403, code: 50013 }));

    for (let i = 0; i < 5; i += 1) {
      await harness.engine.dispatch(inviteMessage(`msg-${i + 1}`));
    }

    expect(harness.gateway.callsOf('kickMember')).toEqual([[SPAMMER, 'Invite-Spam: ≥5 in 15s']]);
    expect(harness.logger.info).toHaveBeenCalledWith('Invite spam threshold crossed', {
      guildId: GUILD_ID,
      userId: SPAMMER,
      outcome: 'kicked',
    });

    harness.db.close();
  });

  it('does not sanction posts spread wider than the window', async () => {
    const harness = createEngineHarness({ members: [SPAMMER] });

    for (let i = 0; i < 6; i += 1) {
      if (i > 0) harness.clock.advance(15_001);
      await harness.engine.dispatch(inviteMessage(`msg-${i + 1}`));
    }

    expect(harness.gateway.callsOf('deleteMessage')).toHaveLength(6);
    expect(harness.gateway.callsOf('timeoutMember')).toEqual([]);
    expect(harness.gateway.callsOf('isMember')).toEqual([]);

    harness.db.close();
  });

  it('leaves trusted authors untouched', async () => {
    const harness = createEngineHarness({ members: [TRUSTED], trusted: [TRUSTED] });

    for (let i = 0; i < 6; i += 1) {
      await harness.engine.dispatch(inviteMessage(`msg-${i + 1}`, { authorId: TRUSTED }));
    }

    expect(harness.gateway.calls).toEqual([]);
    expect(harness.inviteSpam.trackedAccounts).toBe(0);

    harness.db.close();
  });

  it('ignores bot authors and messages without invites', async () => {
    const harness = createEngineHarness({ members: [SPAMMER] });

    await harness.engine.dispatch(inviteMessage('msg-1', { authorIsBot: true }));
    await harness.engine.dispatch(inviteMessage('msg-2', { content: 'see https://example.com/invite/abc' }));

    expect(harness.gateway.calls).toEqual([]);

    harness.db.close();
  });

  it('handles a redelivered message only once', async () => {
    const harness = createEngineHarness({ members: [SPAMMER] });

    await harness.engine.dispatch(inviteMessage('msg-1'));
    await harness.engine.dispatch(inviteMessage('msg-1'));

    expect(harness.gateway.callsOf('deleteMessage')).toEqual([['msg-1']]);
    expect(harness.inviteSpam.countInWindow(SPAMMER)).toBe(1);

    harness.db.close();
  });

  it('keeps counting when the delete fails', async () => {
    const harness = createEngineHarness({ members: [SPAMMER] });
    harness.gateway.failures.set('deleteMessage', () => Object.assign(new Error('Missing Permissions'), { status: 403, code: 50013 }));

    for (let i = 0; i < 5; i += 1) {
      await harness.engine.dispatch(inviteMessage(`msg-${i + 1}`));
    }

    expect(harness.gateway.callsOf('timeoutMember')).toHaveLength(1);
    expect(harness.repos.moderationActions.summarizeSince(0)).toEqual([{ action: 'timeout', count: 1 }]);

    harness.db.close();
  });
});
