import type { FormattedRecipe } from "../agents/recipe-formatter";
import type { ChatbotResponse, ConversationState } from "../types";
import { createLogger } from "../utils/logger";
import type { OrchestratorService } from "./orchestrator.service";

export type OrchestratorFactory = (sessionId: string) => OrchestratorService;

interface Session {
  orchestrator: OrchestratorService;
  lastActive: number;
  /** Tail of this session's turn chain; never rejects. */
  queue: Promise<void>;
}

const log = createLogger("ChatService");

/**
 * Keeps one orchestrator per chat session and runs a session's turns one
 * after another.
 */
export class ChatService {
  private sessions = new Map<string, Session>();

  constructor(
    private readonly createOrchestrator: OrchestratorFactory,
    private readonly sessionTtlMs: number,
    private readonly now: () => number = Date.now
  ) {}

  get sessionCount(): number {
    return this.sessions.size;
  }

  chat(sessionId: string, message: string): Promise<ChatbotResponse> {
    return this.enqueue(sessionId, (orchestrator) =>
      orchestrator.processMessage(message)
    );
  }

  formatCurrentRecipe(sessionId: string): Promise<FormattedRecipe> {
    return this.enqueue(sessionId, (orchestrator) =>
      orchestrator.formatCurrentRecipe()
    );
  }

  getState(sessionId: string): ConversationState {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return {
        availableIngredients: [],
        currentRecipe: null,
        currentMissingIngredients: [],
      };
    }
    return session.orchestrator.getState();
  }

  reset(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  private session(sessionId: string): Session {
    this.evictIdle();

    let session = this.sessions.get(sessionId);
    if (!session) {
      session = {
        orchestrator: this.createOrchestrator(sessionId),
        lastActive: this.now(),
        queue: Promise.resolve(),
      };
      this.sessions.set(sessionId, session);
      log.info("Session started", { sessionId });
    }
    session.lastActive = this.now();
    return session;
  }

  private enqueue<T>(
    sessionId: string,
    task: (orchestrator: OrchestratorService) => Promise<T>
  ): Promise<T> {
    const session = this.session(sessionId);
    const run = session.queue.then(() => task(session.orchestrator));
    // The caller gets `run` and its failure; the chain only keeps order.
    session.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private evictIdle() {
    const cutoff = this.now() - this.sessionTtlMs;
    for (const [id, session] of this.sessions) {
      if (session.lastActive < cutoff) {
        this.sessions.delete(id);
        log.info("Session expired", { sessionId: id });
      }
    }
  }
}
