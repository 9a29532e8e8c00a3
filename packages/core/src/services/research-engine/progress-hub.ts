/**
 * ProgressHub
 *
 * Fan-out of progress events per session. Each session keeps a bounded buffer
 * of its most recent events so a client that reconnects with the last `seq`
 * it saw gets the gap replayed before live delivery resumes. Delivery is
 * at-least-once: a client may see an event again after a reconnect.
 */

import type { ProgressEvent, SequencedEvent } from "../../models/progress";
import { errorMessage } from "../../errors";
import { createModuleLogger } from "../../logger";

const log = createModuleLogger("progress-hub");

export type ProgressListener = (event: SequencedEvent) => void;

interface SessionChannel {
  nextSeq: number;
  buffer: SequencedEvent[];
  listeners: Set<ProgressListener>;
}

export class ProgressHub {
  private readonly sessions = new Map<string, SessionChannel>();

  constructor(private readonly bufferSize = 500) {}

  publish(sessionId: string, event: ProgressEvent): SequencedEvent {
    const channel = this.channel(sessionId);
    const sequenced: SequencedEvent = { ...event, seq: channel.nextSeq++, sessionId };

    channel.buffer.push(sequenced);
    if (channel.buffer.length > this.bufferSize) {
      channel.buffer.splice(0, channel.buffer.length - this.bufferSize);
    }

    for (const listener of channel.listeners) {
      this.deliver(listener, sequenced);
    }
    return sequenced;
  }

  /**
   * Replay buffered events with seq > sinceSeq, then deliver live events
   * until the returned function is called.
   */
  subscribe(sessionId: string, sinceSeq: number, listener: ProgressListener): () => void {
    const channel = this.channel(sessionId);
    for (const event of channel.buffer) {
      if (event.seq > sinceSeq) this.deliver(listener, event);
    }
    channel.listeners.add(listener);
    return () => {
      channel.listeners.delete(listener);
    };
  }

  history(sessionId: string, sinceSeq = -1): SequencedEvent[] {
    return (this.sessions.get(sessionId)?.buffer ?? []).filter((event) => event.seq > sinceSeq);
  }

  lastSeq(sessionId: string): number {
    return (this.sessions.get(sessionId)?.nextSeq ?? 0) - 1;
  }

  /**
   * Drop a session's buffer and listeners. A later publish starts a fresh
   * channel at seq 0.
   */
  release(sessionId: string): void {
    this.sessions.delete(sessionId);
  }

  private channel(sessionId: string): SessionChannel {
    let channel = this.sessions.get(sessionId);
    if (!channel) {
      channel = { nextSeq: 0, buffer: [], listeners: new Set() };
      this.sessions.set(sessionId, channel);
    }
    return channel;
  }

  private deliver(listener: ProgressListener, event: SequencedEvent): void {
    try {
      listener(event);
    } catch (error) {
      log.warn("Progress listener threw", {
        sessionId: event.sessionId,
        seq: event.seq,
        error: errorMessage(error),
      });
    }
  }
}
