/**
 * Correlator Module - Schemas and Types
 *
 * Frames exchanged with the transport collaborator, the requests the
 * correlator tracks, and the lifecycle of each pending request.
 */
import { z } from "zod";

// =============================================================================
// Frames
// =============================================================================

/**
 * Frame handed to the transport. `body` is the UTF-8 JSON text.
 */
export type OutgoingFrame = Readonly<{
  frameId: number;
  endpoint: string;
  body: string;
}>;

/**
 * Frames arriving from the transport, checked before they are routed.
 */
export const IncomingFrameSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("REPLY"),
    frameId: z.number().int().positive(),
    body: z.string(),
  }),
  z.object({
    type: z.literal("FAILURE"),
    frameId: z.number().int().positive(),
    message: z.string(),
  }),
  z.object({
    type: z.literal("UNSOLICITED"),
    body: z.string(),
  }),
]);

export type IncomingFrame = z.infer<typeof IncomingFrameSchema>;

/**
 * The transport collaborator: socket, HTTP bridge or an in-process loopback.
 */
export interface Transport {
  /** Resolves once the frame is handed off; rejects if it could not be sent */
  sendFrame(frame: OutgoingFrame): Promise<void>;
  /** Returns an unsubscribe function */
  subscribe(listener: (frame: unknown) => void): () => void;
}

// =============================================================================
// Requests
// =============================================================================

export type ReadRequest = Readonly<{
  kind: "read";
  name: string;
  endpoint: string;
  body: string;
}>;

export type WriteRequest = Readonly<{
  kind: "write";
  name: string;
  endpoint: string;
  body: string;
  /** Writes sharing a key are sent one at a time in issue order */
  targetKey: string;
}>;

export type CorrelatorRequest = ReadRequest | WriteRequest;

export type Reply = Readonly<{
  requestId: number;
  frameId: number;
  body: string;
  attempts: number;
}>;

export const REQUEST_STATES = [
  "ISSUED",
  "AWAITING_REPLY",
  "RESOLVED",
  "TIMED_OUT",
  "FAILED",
  "CANCELLED",
] as const;

export type RequestState = (typeof REQUEST_STATES)[number];

/**
 * Read-only view of one tracked request.
 */
export type PendingRequest = Readonly<{
  requestId: number;
  kind: CorrelatorRequest["kind"];
  name: string;
  targetKey: string | null;
  state: RequestState;
  attempts: number;
  issuedAt: number;
  /** Deadline of the current attempt, null while queued or backing off */
  deadline: number | null;
  /** True once the caller cancelled; the request still holds its queue slot */
  detached: boolean;
}>;

// =============================================================================
// Configuration
// =============================================================================

export type CorrelatorConfig = Readonly<{
  timeoutMs: number;
  retryBaseMs: number;
  /** Total attempts for reads and opted-in idempotent writes */
  readAttempts: number;
}>;
