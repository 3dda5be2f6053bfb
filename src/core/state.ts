import { MID_SPACE } from '../constants.js';
import type { EngineLifecycle } from '../types/index.js';

export interface RetransmissionControl {
  stop: AbortController;
  task: Promise<void>;
}

/**
 * Mutable session state owned by one DeliveryEngine and handed explicitly to
 * its receiver loop and retransmission tasks.
 */
export class EngineState {
  private mid: number;
  /** Stop signals of every running retransmission task */
  readonly live = new Set<RetransmissionControl>();
  /** Global stop flag for the receiver loop and new sends */
  readonly stop = new AbortController();
  lifecycle: EngineLifecycle = 'idle';

  constructor(startingMid: number) {
    this.mid = startingMid;
  }

  get currentMid(): number {
    return this.mid;
  }

  set currentMid(value: number) {
    this.mid = value;
  }

  get stopped(): boolean {
    return this.stop.signal.aborted;
  }

  /**
   * Hand out the current MID and advance, wrapping modulo 2^16
   */
  nextMid(): number {
    const mid = this.mid;
    this.mid = (this.mid + 1) % MID_SPACE;
    return mid;
  }

  /**
   * Fire every live stop signal
   */
  stopAll(): Promise<void>[] {
    return [...this.live].map((control) => {
      control.stop.abort();
      return control.task;
    });
  }
}
