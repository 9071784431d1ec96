// ABOUTME: Contract for the messaging backend client consumed by the voice pipeline.
// ABOUTME: Defines chat/message projections and the closed set of backend update kinds.

export interface ChatSummary {
  id: string;
  title: string;
  username: string | null;
  unreadCount: number;
  lastMessageAt: number | null;
}

export interface VoiceNote {
  fileId: string;
  durationSeconds: number;
  waveform: number[] | null;
  /** Path of the downloaded file, when the backend already has it locally. */
  localPath: string | null;
}

export interface ChatMessage {
  id: string;
  chatId: string;
  senderId: string;
  isOutgoing: boolean;
  /** Unix time in seconds. */
  date: number;
  text: string | null;
  voice: VoiceNote | null;
}

export interface MessageHandle {
  chatId: string;
  messageId: string;
}

export interface UserProfile {
  id: string;
  firstName: string;
  lastName: string | null;
  username: string | null;
  phoneNumber: string | null;
}

export interface SessionParameters {
  apiId: number;
  apiHash: string;
  databaseDirectory: string;
  filesDirectory: string;
  deviceModel: string;
  applicationVersion: string;
  systemLanguageCode: string;
}

export interface SendVoiceMessageRequest {
  chatId: string;
  path: string;
  durationSeconds: number;
  /** Omitted when the payload is the unconverted recording. */
  waveform?: number[];
}

export interface ChatHistoryQuery {
  chatId: string;
  fromMessageId?: string;
  limit: number;
}

export type AuthorizationStep =
  | "waitParameters"
  | "waitPhoneNumber"
  | "waitCode"
  | "waitPassword"
  | "ready"
  | "loggingOut"
  | "closing"
  | "closed";

export type ConnectionStep =
  | "waitingForNetwork"
  | "connectingToProxy"
  | "connecting"
  | "updating"
  | "ready";

/**
 * Backend pushes. Anything the runtime does not act on lands in `ignored`.
 */
export type TransportUpdate =
  | { type: "authorizationState"; step: AuthorizationStep; passwordHint: string | null }
  | { type: "newMessage"; message: ChatMessage }
  | { type: "fileDownloaded"; fileId: string; localPath: string }
  | { type: "connectionState"; step: ConnectionStep }
  | { type: "ignored"; kind: string };

/** Availability of the client itself, independent of authorization. */
export type TransportState = "uninitialized" | "connecting" | "ready" | "closed";

export type UpdateListener = (update: TransportUpdate) => void;
export type StateListener = (state: TransportState) => void;

export interface TransportClient {
  readonly state: TransportState;
  connect(): Promise<void>;
  close(): Promise<void>;
  onUpdate(listener: UpdateListener): () => void;
  onStateChange(listener: StateListener): () => void;

  setParameters(params: SessionParameters): Promise<void>;
  submitPhoneNumber(phoneNumber: string): Promise<void>;
  submitCode(code: string): Promise<void>;
  submitSecondFactor(password: string): Promise<void>;
  logOut(): Promise<void>;

  getMe(): Promise<UserProfile>;
  listChats(limit: number): Promise<ChatSummary[]>;
  getChatHistory(query: ChatHistoryQuery): Promise<ChatMessage[]>;
  sendVoiceMessage(request: SendVoiceMessageRequest): Promise<MessageHandle>;
  downloadFile(fileId: string): Promise<string>;
}

/**
 * The subset of the client that requires a ready session.
 */
export type SessionOperations = Pick<
  TransportClient,
  "getMe" | "listChats" | "getChatHistory" | "sendVoiceMessage" | "downloadFile"
>;
