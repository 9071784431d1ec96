// ABOUTME: Authorization state machine for the messaging session, driven by backend updates.
// ABOUTME: Gates every non-auth transport operation until the session is ready.

import {
  AuthStepFailedError,
  TransportUnauthenticatedError,
  errorMessage,
} from "../errors.js";
import type { EmitFn } from "../events.js";
import type { MessageStore } from "./message-store.js";
import type {
  AuthorizationStep,
  ChatHistoryQuery,
  SendVoiceMessageRequest,
  SessionOperations,
  SessionParameters,
  TransportClient,
  TransportState,
  TransportUpdate,
  UserProfile,
} from "./transport.js";

export type AuthState =
  | "uninitialized"
  | "awaitingPhoneNumber"
  | "awaitingCode"
  | "awaitingSecondFactor"
  | "ready"
  | "closed";

export type AuthStep = "parameters" | "phoneNumber" | "code" | "secondFactor" | "logOut";

export interface AuthSnapshot {
  state: AuthState;
  lastError: string | null;
  passwordHint: string | null;
  user: UserProfile | null;
}

export type SessionCache = Pick<MessageStore, "clear" | "setCurrentUser">;

export interface AuthStateMachineOptions {
  transport: TransportClient;
  parameters: () => SessionParameters;
  cache: SessionCache;
  emit: EmitFn;
}

const ALLOWED_TRANSITIONS: Record<AuthState, readonly AuthState[]> = {
  uninitialized: ["awaitingPhoneNumber", "awaitingCode", "awaitingSecondFactor", "ready", "closed"],
  awaitingPhoneNumber: ["awaitingCode", "closed"],
  awaitingCode: ["awaitingSecondFactor", "ready", "awaitingPhoneNumber", "closed"],
  awaitingSecondFactor: ["ready", "awaitingPhoneNumber", "closed"],
  ready: ["closed"],
  closed: [],
};

/** State in which each submission is accepted. */
const SUBMISSION_STATE: Record<Exclude<AuthStep, "parameters" | "logOut">, AuthState> = {
  phoneNumber: "awaitingPhoneNumber",
  code: "awaitingCode",
  secondFactor: "awaitingSecondFactor",
};

function stateForStep(step: AuthorizationStep): AuthState | null {
  switch (step) {
    case "waitPhoneNumber":
      return "awaitingPhoneNumber";
    case "waitCode":
      return "awaitingCode";
    case "waitPassword":
      return "awaitingSecondFactor";
    case "ready":
      return "ready";
    case "closed":
      return "closed";
    case "waitParameters":
    case "loggingOut":
    case "closing":
      return null;
  }
}

export class AuthStateMachine {
  private current: AuthState = "uninitialized";
  private lastError: string | null = null;
  private passwordHint: string | null = null;
  private user: UserProfile | null = null;
  private readonly transport: TransportClient;
  private readonly parameters: () => SessionParameters;
  private readonly cache: SessionCache;
  private readonly emit: EmitFn;

  constructor(options: AuthStateMachineOptions) {
    this.transport = options.transport;
    this.parameters = options.parameters;
    this.cache = options.cache;
    this.emit = options.emit;
  }

  get state(): AuthState {
    return this.current;
  }

  snapshot(): AuthSnapshot {
    return {
      state: this.current,
      lastError: this.lastError,
      passwordHint: this.passwordHint,
      user: this.user,
    };
  }

  /**
   * Start following the transport. Returns a function that stops it.
   */
  attach(): () => void {
    const offUpdate = this.transport.onUpdate((update) => this.handleUpdate(update));
    const offState = this.transport.onStateChange((state) => this.handleTransportState(state));
    return () => {
      offUpdate();
      offState();
    };
  }

  handleUpdate(update: TransportUpdate): void {
    if (update.type !== "authorizationState") return;

    if (update.step === "waitParameters") {
      if (this.current === "closed") {
        // The backend started a fresh session after logout
        this.current = "uninitialized";
        this.lastError = null;
        this.publishState();
      }
      void this.run("parameters", () => this.transport.setParameters(this.parameters()));
      return;
    }

    const next = stateForStep(update.step);
    if (next === null) {
      console.log(`[Auth] Backend is ${update.step}`);
      return;
    }

    if (next === "awaitingSecondFactor") {
      this.passwordHint = update.passwordHint;
    }
    this.transition(next);
  }

  /**
   * Throws unless the session is ready.
   */
  requireReady(): void {
    if (this.current !== "ready") {
      throw new TransportUnauthenticatedError(this.current);
    }
  }

  submitPhoneNumber(phoneNumber: string): Promise<void> {
    return this.submit("phoneNumber", () => this.transport.submitPhoneNumber(phoneNumber));
  }

  submitCode(code: string): Promise<void> {
    return this.submit("code", () => this.transport.submitCode(code));
  }

  submitSecondFactor(password: string): Promise<void> {
    return this.submit("secondFactor", () => this.transport.submitSecondFactor(password));
  }

  async logOut(): Promise<void> {
    if (this.current === "closed") {
      this.fail("logOut", "Session is already closed");
      return;
    }
    await this.run("logOut", () => this.transport.logOut());
  }

  private async submit(
    step: keyof typeof SUBMISSION_STATE,
    call: () => Promise<void>,
  ): Promise<void> {
    const expected = SUBMISSION_STATE[step];
    if (this.current !== expected) {
      this.fail(step, `Cannot submit ${step} while ${this.current}`);
      return;
    }
    await this.run(step, call);
  }

  private async run(step: AuthStep, call: () => Promise<void>): Promise<void> {
    try {
      await call();
    } catch (err) {
      this.fail(step, errorMessage(err));
    }
  }

  private fail(step: AuthStep, reason: string): void {
    const error = new AuthStepFailedError(step, reason);
    console.warn(`[Auth] ${step} failed: ${error.message}`);
    this.lastError = error.message;
    this.emit("auth:step-failed", { step, reason: error.message });
  }

  private handleTransportState(state: TransportState): void {
    if (state === "closed" && this.current !== "closed") {
      console.warn("[Auth] Transport closed, ending session");
      this.transition("closed");
    }
  }

  private transition(next: AuthState): void {
    if (next === this.current) return;

    if (!ALLOWED_TRANSITIONS[this.current].includes(next)) {
      console.warn(`[Auth] Ignoring transition ${this.current} -> ${next}`);
      return;
    }

    console.log(`[Auth] ${this.current} -> ${next}`);
    this.current = next;
    this.lastError = null;
    if (next !== "awaitingSecondFactor") {
      this.passwordHint = null;
    }

    if (next === "closed") {
      this.user = null;
      this.cache.clear();
    }

    this.publishState();

    if (next === "ready") {
      void this.loadCurrentUser();
    }
  }

  private async loadCurrentUser(): Promise<void> {
    try {
      const user = await this.transport.getMe();
      if (this.current !== "ready") return;
      this.user = user;
      this.cache.setCurrentUser(user);
      this.publishState();
    } catch (err) {
      console.warn("[Auth] Could not load current user:", errorMessage(err));
    }
  }

  private publishState(): void {
    this.emit("auth:state-changed", this.snapshot());
  }
}

/**
 * Session-only transport operations, each checked against the auth state first.
 */
export class SessionTransport implements SessionOperations {
  constructor(
    private readonly transport: TransportClient,
    private readonly auth: Pick<AuthStateMachine, "requireReady">,
  ) {}

  async getMe(): Promise<UserProfile> {
    this.auth.requireReady();
    return this.transport.getMe();
  }

  async listChats(limit: number) {
    this.auth.requireReady();
    return this.transport.listChats(limit);
  }

  async getChatHistory(query: ChatHistoryQuery) {
    this.auth.requireReady();
    return this.transport.getChatHistory(query);
  }

  async sendVoiceMessage(request: SendVoiceMessageRequest) {
    this.auth.requireReady();
    return this.transport.sendVoiceMessage(request);
  }

  async downloadFile(fileId: string): Promise<string> {
    this.auth.requireReady();
    return this.transport.downloadFile(fileId);
  }
}
