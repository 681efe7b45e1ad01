// ============================================
// Core domain types
// ============================================

/** A contiguous span of a source document. Immutable once created. */
export interface Chunk {
  chunkId: string;
  documentId: string;
  /** Position within the source document */
  index: number;
  text: string;
}

/**
 * A chunk produced for one query.
 * `score` is only comparable within a single ranking stage: cosine similarity
 * or lexical relevance before fusion, cross-encoder relevance after reranking.
 */
export interface RetrievalCandidate extends Chunk {
  score: number;
}

/** A keyword hit: identifiers only, payload is looked up from persistence */
export interface LexicalHit {
  chunkId: string;
  score: number;
}

export type ConversationRole = "user" | "assistant";

/** A message in a session's conversation log */
export interface ConversationTurn {
  role: ConversationRole;
  content: string;
}

/** Booking fields as extracted from a tool call, each optional until validated */
export interface BookingSlotSet {
  name?: string;
  email?: string;
  date?: string;
  time?: string;
}

/** Slots that passed every unambiguity check */
export interface ValidBookingSlots {
  name: string;
  email: string;
  /** YYYY-MM-DD */
  date: string;
  /** HH:MM, 24-hour */
  time: string;
}

/** A committed booking. The only durable artifact a turn produces */
export interface Booking extends ValidBookingSlots {
  id: string;
  createdAt: string;
}

// ============================================
// Turn outcomes
// ============================================

export type FallThroughReason =
  | "no_intent"
  | "no_tool_call"
  | "unsupported_tool"
  | "malformed_arguments"
  | "generation_failed";

/** Booking path declined; the turn is answered from retrieved context */
export interface NoIntentOutcome {
  kind: "no_intent";
  reason: FallThroughReason;
}

export interface ClarificationOutcome {
  kind: "clarification";
  question: string;
}

export interface CommittedOutcome {
  kind: "committed";
  booking: Booking;
  reply: string;
}

/** The booking was validated but could not be stored */
export interface BookingFailedOutcome {
  kind: "booking_failed";
  reply: string;
}

export interface AnsweredFromContextOutcome {
  kind: "answered_from_context";
  reply: string;
  sources: RetrievalCandidate[];
}

export type ToolInvocationOutcome =
  | NoIntentOutcome
  | ClarificationOutcome
  | CommittedOutcome
  | BookingFailedOutcome
  | AnsweredFromContextOutcome;

/** Outcomes that end a turn */
export type TerminalOutcome = Exclude<ToolInvocationOutcome, NoIntentOutcome>;

/** Source reference returned alongside a reply */
export interface SourceChunk {
  documentId: string;
  chunkIndex: number;
  textPreview: string;
}

/** What a caller receives for one turn */
export interface TurnResult {
  reply: string;
  sources: SourceChunk[];
  bookingCreated: boolean;
  bookingId: string | null;
}

// ============================================
// Ingestion
// ============================================

export interface DocumentRecord {
  id: string;
  title: string;
  filename: string;
  contentType: string;
  createdAt: string;
}

export interface IngestResult {
  documentId: string;
  chunksIndexed: number;
}
