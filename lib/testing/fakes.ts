import type { Embedder } from "../embeddings";
import type { CompletionClient, CompletionOptions } from "../llm";

type Reply = string | Error | ((prompt: string) => string | Promise<string>);

/** Replays scripted replies in order; the last one repeats once the script runs out. */
export class ScriptedCompletionClient implements CompletionClient {
  readonly prompts: string[] = [];
  readonly options: CompletionOptions[] = [];
  private readonly replies: Reply[];

  constructor(replies: Reply[]) {
    this.replies = [...replies];
  }

  get calls(): number {
    return this.prompts.length;
  }

  push(...replies: Reply[]): void {
    this.replies.push(...replies);
  }

  async complete(prompt: string, _model: string, opts: CompletionOptions = {}): Promise<string> {
    this.prompts.push(prompt);
    this.options.push(opts);
    const reply = this.replies.length > 1 ? this.replies.shift() : this.replies[0];
    if (reply === undefined) throw new Error("no scripted reply");
    if (reply instanceof Error) throw reply;
    if (typeof reply === "function") return reply(prompt);
    return reply;
  }
}

/** Never settles; for exercising timeouts. */
export class HangingCompletionClient implements CompletionClient {
  calls = 0;

  complete(): Promise<string> {
    this.calls += 1;
    return new Promise<string>(() => {});
  }
}

/**
 * Looks vectors up by exact text; anything unknown maps to `fallback`. Texts
 * listed in `failing` reject.
 */
export class MapEmbedder implements Embedder {
  readonly model = "map-embedder";
  readonly seen: string[] = [];

  constructor(
    private readonly vectors: Record<string, number[]>,
    private readonly fallback: number[] = [0, 0, 1],
    private readonly failing: ReadonlySet<string> = new Set()
  ) {}

  async embed(text: string): Promise<number[]> {
    this.seen.push(text);
    if (this.failing.has(text)) throw new Error(`cannot embed ${text}`);
    return this.vectors[text] ?? this.fallback;
  }
}

export class ManualClock {
  constructor(private current = Date.parse("2026-01-05T09:00:00.000Z")) {}

  readonly now = (): number => this.current;

  advance(ms: number): void {
    this.current += ms;
  }
}

export function mcReply(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({
    type: "multiple_choice",
    prompt: "Which organelle produces most of a cell's ATP?",
    choices: ["Mitochondrion", "Ribosome", "Golgi apparatus", "Lysosome"],
    correctIndex: 0,
    explanation: "Oxidative phosphorylation happens in the mitochondria.",
    difficulty: "beginner",
    ...overrides,
  });
}
