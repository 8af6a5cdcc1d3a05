/**
 * Message channels between the MAPE-K components.
 *
 * Components share no memory; everything they exchange is a structured
 * record published on one of these channels. Every record carries the loop
 * tick it belongs to and a publish timestamp so consumers can drop stale
 * input.
 *
 * @module domain/simulation/bus
 */

import type { Direction } from "../../../shared/constants/GridEnums";
import type {
  AdaptationDecision,
  RobotStatus,
} from "../../../shared/constants/MissionEnums";
import type { MissionErrorCode } from "../../../shared/errors";
import type {
  Coordinate,
  EnvironmentSnapshot,
  RobotState,
} from "../../types/simulation/grid";
import type {
  KnowledgePatch,
  KnowledgeSnapshot,
} from "../../types/simulation/knowledge";
import type {
  ExecuteReport,
  MonitorFacts,
  PlanOutput,
  SampleContext,
} from "../../types/simulation/mape";

export interface Envelope {
  tick: number;
  timestamp: number;
}

export type EnvironmentCommandKind =
  | "move"
  | "load"
  | "deliver"
  | "status"
  | "toggle";

/**
 * Channel name to payload map.
 */
export interface MissionChannels {
  "monitor.request": Envelope;
  "monitor.result": Envelope & {
    facts: MonitorFacts;
    context: SampleContext;
  };
  "analyze.result": Envelope & {
    decision: AdaptationDecision;
    reason: string;
    facts: MonitorFacts;
    context: SampleContext;
  };
  "plan.result": Envelope & { result: PlanOutput };
  "execute.result": Envelope & { report: ExecuteReport };

  "knowledge.update": Envelope & {
    /** Tick of the monitor request this broadcast answers, null for change broadcasts */
    sampleTick: number | null;
    snapshot: KnowledgeSnapshot | null;
  };
  "knowledge.set": Envelope & { patch: KnowledgePatch; source: string };

  "environment.update": Envelope & {
    sampleTick: number | null;
    snapshot: EnvironmentSnapshot | null;
  };
  "environment.move": Envelope & { commandId: string; direction: Direction };
  "environment.load": Envelope & { commandId: string; orderIds: string[] };
  "environment.deliver": Envelope & { commandId: string; orderId: string };
  "environment.set_status": Envelope & {
    commandId: string;
    status: RobotStatus;
  };
  "environment.status": Envelope & {
    commandId: string;
    command: EnvironmentCommandKind;
    ok: boolean;
    robot: RobotState | null;
    error?: string;
    errorCode?: MissionErrorCode;
  };

  "user.add_order": Envelope & { orderId: string; destination: Coordinate };
  "user.toggle_obstacle": Envelope & { commandId: string; cell: Coordinate };

  "system.init": Envelope;
  "system.reset": Envelope;
}

export type ChannelName = keyof MissionChannels;
export type ChannelData<C extends ChannelName> = MissionChannels[C];
export type ChannelHandler<C extends ChannelName> = (
  data: ChannelData<C>,
) => void;

export interface BusStats {
  totalPublished: number;
  publishCounts: Partial<Record<ChannelName, number>>;
  handlerCounts: Partial<Record<ChannelName, number>>;
  pending: number;
}

/**
 * Publish/subscribe transport. Delivery is FIFO per channel and
 * fire-and-forget for the publisher; a networked broker can stand behind the
 * same interface.
 */
export interface MessageBus {
  subscribe<C extends ChannelName>(
    channel: C,
    handler: ChannelHandler<C>,
  ): () => void;
  publish<C extends ChannelName>(channel: C, data: ChannelData<C>): void;
  /** Delivers everything queued so far, including messages published while draining */
  flush(): void;
  clear(): void;
  getStats(): BusStats;
}
