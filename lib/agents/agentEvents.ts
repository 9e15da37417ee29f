// lib/agents/agentEvents.ts
// Typed per-agent change notifications. Handlers run synchronously, inside the
// step of the agent that emits them.

import type { MotorOutcome, SymbolMap } from '../mediator/symbols';
import type { Chunk } from '../engines/chunks';

export type AgentEventMap = {
  'production-fired': { agentId: string; actrTime: number; production: string };
  'goal-changed': { agentId: string; actrTime: number; before: Chunk | null; after: Chunk | null };
  'imaginal-changed': { agentId: string; actrTime: number; buffer: string; before: Chunk | null; after: Chunk | null };
  'key-pressed': { agentId: string; actrTime: number; key: string };
  stimulus: { agentId: string; actrTime: number; stimulus: SymbolMap };
  'motor-result': { agentId: string; actrTime: number; outcome: MotorOutcome };
};

export type AgentEventKind = keyof AgentEventMap;
export type AgentEventHandler<K extends AgentEventKind> = (payload: AgentEventMap[K]) => void;

type HandlerSets = { [K in AgentEventKind]: Set<AgentEventHandler<K>> };

export class AgentEvents {
  private handlers: HandlerSets = {
    'production-fired': new Set(),
    'goal-changed': new Set(),
    'imaginal-changed': new Set(),
    'key-pressed': new Set(),
    stimulus: new Set(),
    'motor-result': new Set(),
  };

  on<K extends AgentEventKind>(kind: K, handler: AgentEventHandler<K>): () => void {
    const set: Set<AgentEventHandler<K>> = this.handlers[kind];
    set.add(handler);
    return () => {
      set.delete(handler);
    };
  }

  emit<K extends AgentEventKind>(kind: K, payload: AgentEventMap[K]): void {
    const set: Set<AgentEventHandler<K>> = this.handlers[kind];
    for (const h of Array.from(set)) h(payload);
  }

  listenerCount(kind: AgentEventKind): number {
    return this.handlers[kind].size;
  }

  clear(): void {
    for (const set of Object.values(this.handlers)) set.clear();
  }
}
