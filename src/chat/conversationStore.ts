import { z } from 'zod';
import type { RedisClient } from '../redis/client.js';
import type { Message } from './llmProvider.js';

/** Ordered, append-only transcript of one chat session. */
export interface ConversationStore {
  append(message: Message): Promise<void>;
  messages(): Promise<Message[]>;
  clear(): Promise<void>;
}

/** Hands out the store for a session id, creating it on first use. */
export interface SessionRegistry {
  get(sessionId: string): ConversationStore;
}

export class InMemoryConversationStore implements ConversationStore {
  private entries: Message[] = [];

  async append(message: Message): Promise<void> {
    this.entries.push(Object.freeze({ role: message.role, content: message.content }));
  }

  async messages(): Promise<Message[]> {
    return [...this.entries];
  }

  async clear(): Promise<void> {
    this.entries = [];
  }
}

const storedMessageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant']),
  content: z.string(),
});

/**
 * Transcript kept in a Redis list (`chat:session:<id>`). The TTL is refreshed
 * on every append, so idle sessions expire.
 */
export class RedisConversationStore implements ConversationStore {
  private key: string;

  constructor(
    private readonly redis: RedisClient,
    sessionId: string,
    private readonly ttlSeconds: number,
  ) {
    this.key = `chat:session:${sessionId}`;
  }

  async append(message: Message): Promise<void> {
    await this.redis.rpush(this.key, JSON.stringify({ role: message.role, content: message.content }));
    await this.redis.expire(this.key, this.ttlSeconds);
  }

  async messages(): Promise<Message[]> {
    const raw = await this.redis.lrange(this.key, 0, -1);
    return raw.map((entry) => storedMessageSchema.parse(JSON.parse(entry)));
  }

  async clear(): Promise<void> {
    await this.redis.del(this.key);
  }
}

export function createInMemorySessionRegistry(): SessionRegistry {
  const sessions = new Map<string, ConversationStore>();
  return {
    get(sessionId) {
      let store = sessions.get(sessionId);
      if (!store) {
        store = new InMemoryConversationStore();
        sessions.set(sessionId, store);
      }
      return store;
    },
  };
}

export function createRedisSessionRegistry(redis: RedisClient, ttlSeconds: number): SessionRegistry {
  return {
    get: (sessionId) => new RedisConversationStore(redis, sessionId, ttlSeconds),
  };
}
