import type { ConversationTurn, Instructor } from '@shared/schema';
import type { AnswerComposer } from './answer-service';

export const MAX_TRANSCRIPT_TURNS = 30;

export type ConversationState = 'empty' | 'active';

export interface TranscriptStore {
  load(key: string): Promise<ConversationTurn[]>;
  save(key: string, turns: ConversationTurn[]): Promise<void>;
  clear(key: string): Promise<void>;
}

export function transcriptKey(instructorId: number, studentKey: string): string {
  return `${instructorId}:${studentKey}`;
}

export function trimTranscript(turns: ConversationTurn[], maxTurns: number = MAX_TRANSCRIPT_TURNS): ConversationTurn[] {
  return turns.length > maxTurns ? turns.slice(-maxTurns) : turns;
}

interface StoredTranscript {
  turns: ConversationTurn[];
  expiresAt: number;
}

// Transcripts expire ttlMs after their last write
export class MemoryTranscriptStore implements TranscriptStore {
  private transcripts = new Map<string, StoredTranscript>();

  constructor(
    private ttlMs: number,
    private now: () => number = Date.now,
  ) {}

  async load(key: string): Promise<ConversationTurn[]> {
    const stored = this.transcripts.get(key);
    if (!stored) return [];
    if (stored.expiresAt <= this.now()) {
      this.transcripts.delete(key);
      return [];
    }
    return stored.turns.map((turn) => ({ ...turn }));
  }

  async save(key: string, turns: ConversationTurn[]): Promise<void> {
    this.sweep();
    this.transcripts.set(key, {
      turns: turns.map((turn) => ({ ...turn })),
      expiresAt: this.now() + this.ttlMs,
    });
  }

  async clear(key: string): Promise<void> {
    this.transcripts.delete(key);
  }

  /** Drops expired transcripts; returns how many were removed. */
  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, stored] of Array.from(this.transcripts.entries())) {
      if (stored.expiresAt <= now) {
        this.transcripts.delete(key);
        removed++;
      }
    }
    return removed;
  }
}

export class ConversationSession {
  private readonly key: string;

  constructor(
    private instructor: Instructor,
    studentKey: string,
    private store: TranscriptStore,
    private composer: AnswerComposer,
  ) {
    this.key = transcriptKey(instructor.id, studentKey);
  }

  async transcript(): Promise<ConversationTurn[]> {
    return this.store.load(this.key);
  }

  async state(): Promise<ConversationState> {
    const turns = await this.store.load(this.key);
    return turns.length > 0 ? 'active' : 'empty';
  }

  async appendUserTurn(text: string): Promise<void> {
    const content = text.trim();
    if (!content) return;
    const turns = await this.store.load(this.key);
    turns.push({ role: 'user', content });
    await this.store.save(this.key, trimTranscript(turns));
  }

  async requestAnswer(): Promise<string> {
    const turns = await this.store.load(this.key);
    const answer = await this.composer.composeAnswer(this.instructor, turns);
    turns.push({ role: 'assistant', content: answer });
    await this.store.save(this.key, trimTranscript(turns));
    return answer;
  }

  async reset(): Promise<void> {
    await this.store.clear(this.key);
    console.log(`[Chat] Transcript reset for instructor ${this.instructor.id}`);
  }
}
