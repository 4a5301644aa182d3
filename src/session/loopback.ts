/**
 * In-process transport. A responder function plays the device: it sees
 * each outgoing frame and answers with a reply body, a failure, or
 * nothing (the frame is lost). Answers arrive asynchronously, as they
 * would from a socket.
 */
import type {
  IncomingFrame,
  OutgoingFrame,
  Transport,
} from "../correlator/index.js";

export type LoopbackAnswer =
  | Readonly<{ reply: string }>
  | Readonly<{ failure: string }>
  | null;

export type LoopbackResponder = (frame: OutgoingFrame) => LoopbackAnswer;

export type LoopbackTransport = Transport &
  Readonly<{
    /** Every frame sent so far, oldest first */
    sent: readonly OutgoingFrame[];
    /** Deliver a status the device sent on its own */
    push: (body: string) => void;
  }>;

export function createLoopbackTransport(
  respond: LoopbackResponder,
): LoopbackTransport {
  const sent: OutgoingFrame[] = [];
  const listeners = new Set<(frame: unknown) => void>();

  const deliver = (frame: IncomingFrame): void => {
    queueMicrotask(() => {
      for (const listener of listeners) listener(frame);
    });
  };

  return {
    sent,
    async sendFrame(frame) {
      sent.push(frame);
      const answer = respond(frame);
      if (answer === null) return;
      if ("reply" in answer) {
        deliver({ type: "REPLY", frameId: frame.frameId, body: answer.reply });
      } else {
        deliver({ type: "FAILURE", frameId: frame.frameId, message: answer.failure });
      }
    },
    subscribe(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    push(body) {
      deliver({ type: "UNSOLICITED", body });
    },
  };
}
