/**
 * Rate limiting for page -> host messages. Each topic has its own throttle,
 * so a burst on one topic never replaces the pending message of another.
 */

import type { DebouncedFunc } from "lodash";
import throttle from "lodash/throttle";
import type { ClientMessage } from "./protocol";

export type ClientTopic = ClientMessage["topic"];

export interface ThrottledSender {
  /** Send now, or as the trailing call of this topic's window. */
  send(message: ClientMessage): void;
  /** Drop the pending message of one topic. */
  cancel(topic: ClientTopic): void;
  /** Send the pending message of one topic now. */
  flush(topic: ClientTopic): void;
  cancelAll(): void;
}

export function createThrottledSender(send: (message: ClientMessage) => void, waitMs: number): ThrottledSender {
  const throttles = new Map<ClientTopic, DebouncedFunc<(message: ClientMessage) => void>>();

  const forTopic = (topic: ClientTopic) => {
    let throttled = throttles.get(topic);
    if (!throttled) {
      throttled = throttle((message: ClientMessage) => send(message), waitMs);
      throttles.set(topic, throttled);
    }
    return throttled;
  };

  return {
    send: (message) => forTopic(message.topic)(message),
    cancel: (topic) => throttles.get(topic)?.cancel(),
    flush: (topic) => {
      throttles.get(topic)?.flush();
    },
    cancelAll: () => {
      for (const throttled of throttles.values()) throttled.cancel();
    },
  };
}
