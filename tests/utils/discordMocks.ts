/**
 * Conference Bot — tests/utils/discordMocks.ts
 * WHAT: Factory functions for minimal discord.js mocks in tests.
 * WHY: Avoids boilerplate in test files and keeps mock shapes consistent.
 * USAGE:
 *  import { createMockInteraction, createMockGuild } from "../utils/discordMocks.js";
 *  const interaction = createMockInteraction({ guildId: "test-guild" });
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { vi } from "vitest";
import {
  ChannelType,
  Collection,
  DiscordAPIError,
  type ButtonInteraction,
  type ChatInputCommandInteraction,
  type Guild,
  type GuildMember,
  type Message,
  type ModalSubmitInteraction,
  type Role,
  type TextChannel,
  type User,
} from "discord.js";

/**
 * Plain overrides. Partial<User> and friends reject object literals because
 * the classes narrow toString/valueOf.
 */
type MockOverrides = Record<string, unknown>;

// ===== User / Role / Member Mocks =====

export function createMockUser(overrides: MockOverrides = {}): User {
  return {
    id: "user-123",
    username: "testuser",
    tag: "testuser#0",
    bot: false,
    ...overrides,
  } as unknown as User;
}

export function createMockRole(overrides: MockOverrides = {}): Role {
  return {
    id: "role-123",
    name: "Test Role",
    position: 1,
    ...overrides,
  } as unknown as Role;
}

/**
 * roles.cache is a Collection so .some()/.keys() behave like discord.js.
 */
export function createMockMember(options: { id?: string; roles?: Role[] } = {}): GuildMember {
  const rolesCache = new Collection<string, Role>();
  for (const role of options.roles ?? []) rolesCache.set(role.id, role);

  return {
    id: options.id ?? "user-123",
    roles: {
      cache: rolesCache,
      add: vi.fn().mockResolvedValue(undefined),
    },
    setNickname: vi.fn().mockResolvedValue(undefined),
  } as unknown as GuildMember;
}

// ===== Message / Channel Mocks =====

export function createMockMessage(overrides: MockOverrides = {}): Message {
  return {
    id: "message-123",
    content: "Test message",
    author: createMockUser(),
    createdTimestamp: Date.now(),
    edit: vi.fn().mockResolvedValue(undefined),
    delete: vi.fn().mockResolvedValue(undefined),
    pin: vi.fn().mockResolvedValue(undefined),
    unpin: vi.fn().mockResolvedValue(undefined),
    ...overrides,
  } as unknown as Message;
}

export type MockTextChannel = TextChannel & {
  send: ReturnType<typeof vi.fn>;
  bulkDelete: ReturnType<typeof vi.fn>;
  messages: { fetch: ReturnType<typeof vi.fn>; fetchPinned: ReturnType<typeof vi.fn> };
};

/**
 * A GuildText channel. `history` is what messages.fetch returns once
 * (then empty); `pinned` is what fetchPinned returns.
 */
export function createMockChannel(
  options: { id?: string; name?: string; history?: Message[]; pinned?: Message[]; sent?: Message } = {}
): MockTextChannel {
  const toCollection = (messages: Message[]) =>
    new Collection<string, Message>(messages.map((m) => [m.id, m]));

  const fetch = vi.fn().mockResolvedValueOnce(toCollection(options.history ?? [])).mockResolvedValue(toCollection([]));

  return {
    id: options.id ?? "channel-123",
    name: options.name ?? "test-channel",
    type: ChannelType.GuildText,
    send: vi.fn().mockResolvedValue(options.sent ?? createMockMessage()),
    bulkDelete: vi.fn().mockImplementation(async (messages: Collection<string, Message>) => messages),
    messages: {
      fetch,
      fetchPinned: vi.fn().mockResolvedValue(toCollection(options.pinned ?? [])),
    },
  } as unknown as MockTextChannel;
}

// ===== Guild Mocks =====

export function createMockGuild(
  options: { id?: string; channels?: TextChannel[]; roles?: Role[]; members?: GuildMember[]; botId?: string } = {}
): Guild {
  const channelsCache = new Collection<string, TextChannel>();
  for (const channel of options.channels ?? []) channelsCache.set(channel.id, channel);
  const rolesCache = new Collection<string, Role>();
  for (const role of options.roles ?? []) rolesCache.set(role.id, role);
  const membersCache = new Collection<string, GuildMember>();
  for (const member of options.members ?? []) membersCache.set(member.id, member);

  return {
    id: options.id ?? "guild-123",
    name: "Test Guild",
    client: { user: { id: options.botId ?? "bot-123" } },
    channels: { cache: channelsCache },
    roles: { cache: rolesCache },
    members: {
      cache: membersCache,
      fetch: vi.fn().mockImplementation(async (id?: string) => {
        if (id === undefined) return membersCache;
        const member = membersCache.get(id);
        if (!member) throw new Error(`Unknown Member: ${id}`);
        return member;
      }),
    },
  } as unknown as Guild;
}

// ===== Interaction Mocks =====

function replyMethods() {
  return {
    deferred: false,
    replied: false,
    reply: vi.fn().mockImplementation(async function (this: { replied: boolean }) {
      this.replied = true;
    }),
    deferReply: vi.fn().mockImplementation(async function (this: { deferred: boolean }) {
      this.deferred = true;
    }),
    editReply: vi.fn().mockResolvedValue(undefined),
    followUp: vi.fn().mockResolvedValue(undefined),
  };
}

export function createMockInteraction(
  options: { user?: User; guild?: Guild | null; commandName?: string; ping?: number } = {}
): ChatInputCommandInteraction {
  const user = options.user ?? createMockUser();
  const guild = options.guild === undefined ? createMockGuild() : options.guild;

  return {
    id: "interaction-123",
    user,
    guild,
    guildId: guild?.id ?? null,
    channelId: "channel-123",
    client: { ws: { ping: options.ping ?? 42 } },
    commandName: options.commandName ?? "test",
    ...replyMethods(),
    isChatInputCommand: () => true,
    isModalSubmit: () => false,
  } as unknown as ChatInputCommandInteraction;
}

export function createMockButtonInteraction(options: { customId?: string } = {}): ButtonInteraction {
  return {
    id: "button-interaction-123",
    customId: options.customId ?? "v1:test:button",
    user: createMockUser(),
    guild: createMockGuild(),
    guildId: "guild-123",
    channelId: "channel-123",
    ...replyMethods(),
    showModal: vi.fn().mockResolvedValue(undefined),
    isChatInputCommand: () => false,
    isModalSubmit: () => false,
  } as unknown as ButtonInteraction;
}

export function createMockModalInteraction(
  options: { user?: User; guild?: Guild | null; fields?: Record<string, string> } = {}
): ModalSubmitInteraction {
  const user = options.user ?? createMockUser();
  const guild = options.guild === undefined ? createMockGuild() : options.guild;
  const fields = options.fields ?? {};

  return {
    id: "modal-interaction-123",
    customId: "v1:test:modal",
    user,
    guild,
    guildId: guild?.id ?? null,
    channelId: "channel-123",
    fields: {
      getTextInputValue: vi.fn().mockImplementation((name: string) => fields[name] ?? ""),
    },
    ...replyMethods(),
    isChatInputCommand: () => false,
    isModalSubmit: () => true,
  } as unknown as ModalSubmitInteraction;
}

// ===== Discord Error Mocks =====

/**
 * A real DiscordAPIError so instanceof checks in cmdWrap match.
 */
export function createDiscordAPIError(code: number, message: string, status = 400): DiscordAPIError {
  return new DiscordAPIError({ code, message }, code, status, "POST", "/interactions/123/token/callback", {});
}
