/**
 * ResponderSimulator - drives a responder between a TAP stand-in and a
 * receive mailbox on two unrelated clocks
 *
 * Design Pattern: Mediator
 * - The responder never touches the host stand-ins directly
 * - Receive and transmit clocks advance on their own periods
 *
 * Design Pattern: Observer
 * - Emits `rx-tick`, `tx-tick` and `frame-out` to registered listeners
 *
 * @example
 * ```typescript
 * const tap = new TapHost();
 * const collector = new FrameCollector();
 * const sim = new ResponderSimulator(responder, tap, collector);
 *
 * sim.on('frame-out', ({ frame }) => console.log(formatHexDump(frame)));
 * tap.inject(request.toBytes());
 * sim.runUntilQuiet();
 * ```
 */

import type { ProtocolResponder } from '@/domain/responder/ProtocolResponder';
import type { ByteSample } from '@/domain/responder/types';
import type { TapHost } from '@/host/TapHost';
import type { FrameCollector } from '@/host/FrameCollector';
import { Logger } from './Logger';
import { ClockDomain } from './ClockDomain';

export interface SimulationEventMap {
  'rx-tick': { time: number; sample: ByteSample | undefined };
  'tx-tick': { time: number; sample: ByteSample };
  'frame-out': { time: number; frame: Uint8Array };
}

export type SimulationEventType = keyof SimulationEventMap;

export type SimulationCallback<K extends SimulationEventType> = (data: SimulationEventMap[K]) => void;

type ListenerSets = { [K in SimulationEventType]: Set<SimulationCallback<K>> };

export interface ResponderSimulatorOptions {
  /** Receive clock period (default 8 ns, 125 MHz) */
  rxPeriodNs?: number;
  /** Transmit clock period (default 10 ns, 100 MHz) */
  txPeriodNs?: number;
}

export const DEFAULT_RX_PERIOD_NS = 8;
export const DEFAULT_TX_PERIOD_NS = 10;

const SOURCE = 'simulator';

export class ResponderSimulator {
  private readonly responder: ProtocolResponder;
  private readonly source: TapHost;
  private readonly sink: FrameCollector;
  private readonly rxClock: ClockDomain;
  private readonly txClock: ClockDomain;
  private readonly listeners: ListenerSets = {
    'rx-tick': new Set(),
    'tx-tick': new Set(),
    'frame-out': new Set(),
  };
  private time = 0;

  constructor(
    responder: ProtocolResponder,
    source: TapHost,
    sink: FrameCollector,
    options: ResponderSimulatorOptions = {}
  ) {
    this.responder = responder;
    this.source = source;
    this.sink = sink;
    this.rxClock = new ClockDomain('rx', options.rxPeriodNs ?? DEFAULT_RX_PERIOD_NS);
    this.txClock = new ClockDomain('tx', options.txPeriodNs ?? DEFAULT_TX_PERIOD_NS);

    this.sink.onFrame(frame => this.emit('frame-out', { time: this.time, frame }));
  }

  public on<K extends SimulationEventType>(event: K, callback: SimulationCallback<K>): void {
    this.listeners[event].add(callback);
  }

  public off<K extends SimulationEventType>(event: K, callback: SimulationCallback<K>): void {
    this.listeners[event].delete(callback);
  }

  /**
   * Advances simulated time by `durationNs`, firing every clock edge that
   * falls inside it. On a shared edge the receive side goes first.
   */
  public run(durationNs: number): void {
    const end = this.time + durationNs;

    for (;;) {
      const rxEdge = this.rxClock.getNextEdge();
      const txEdge = this.txClock.getNextEdge();
      if (Math.min(rxEdge, txEdge) > end) {
        break;
      }

      if (rxEdge <= txEdge) {
        this.time = this.rxClock.tick();
        const sample = this.source.next();
        this.responder.rxTick(sample);
        this.emit('rx-tick', { time: this.time, sample });
      } else {
        this.time = this.txClock.tick();
        const sample = this.responder.txTick(this.sink);
        this.emit('tx-tick', { time: this.time, sample });
      }
    }

    this.time = end;
  }

  /**
   * Runs until the TAP side is drained and the responder holds no frame,
   * or until `maxDurationNs` has elapsed. Returns true when quiet was reached.
   */
  public runUntilQuiet(maxDurationNs: number = 1_000_000): boolean {
    const deadline = this.time + maxDurationNs;
    const step = Math.max(this.rxClock.periodNs, this.txClock.periodNs);

    while (this.time < deadline) {
      this.run(Math.min(step, deadline - this.time));
      if (this.isQuiet()) {
        return true;
      }
    }

    Logger.warn(SOURCE, 'simulator:timeout', `Not quiet after ${maxDurationNs} ns`, {
      arp: this.responder.getSenderState('arp'),
      icmp: this.responder.getSenderState('icmp'),
    });
    return false;
  }

  public isQuiet(): boolean {
    return this.source.isDrained() && this.responder.isQuiet() && !this.sink.isReceiving();
  }

  public getTime(): number {
    return this.time;
  }

  public getTickCounts(): { rx: number; tx: number } {
    return { rx: this.rxClock.getTickCount(), tx: this.txClock.getTickCount() };
  }

  private emit<K extends SimulationEventType>(event: K, data: SimulationEventMap[K]): void {
    this.listeners[event].forEach(callback => callback(data));
  }
}
