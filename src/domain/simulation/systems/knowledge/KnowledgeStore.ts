import { injectable } from "inversify";
import { isDeepStrictEqual } from "node:util";
import { logger } from "@/infrastructure/utils/logger";
import { LogCategory } from "@/shared/constants/LogEnums";
import { OrderStatus } from "@/shared/constants/MissionEnums";
import { InvalidCellError, ValidationError } from "@/shared/errors";
import { samePoint } from "@/shared/utils/mathUtils";
import { frozenClone } from "@/shared/utils/objectUtils";
import type { Coordinate } from "../../../types/simulation/grid";
import type {
  KnowledgeField,
  KnowledgePatch,
  KnowledgeSnapshot,
  KnowledgeState,
  Order,
} from "../../../types/simulation/knowledge";
import {
  createInitialKnowledge,
  type KnowledgeSettings,
} from "./defaultKnowledge";
import {
  isCoordinate,
  KNOWLEDGE_FIELDS,
  parseKnowledgePatch,
} from "./patchValidation";

export interface NewOrder {
  id: string;
  destination: Coordinate;
  createdAt: number;
}

export interface KnowledgeChange {
  snapshot: KnowledgeSnapshot;
  /** False when the update left every field as it was */
  changed: boolean;
  fields: KnowledgeField[];
}

export type KnowledgeListener = (change: KnowledgeChange) => void;

/**
 * Single source of truth for mission state.
 *
 * Readers get deep-frozen snapshots; writers go through `applyUpdate`, which
 * validates the whole patch before touching anything. The revision only
 * advances when an update actually changes content, so applying the same
 * patch twice is a no-op.
 */
@injectable()
export class KnowledgeStore {
  private state: KnowledgeState | null = null;
  private settings: KnowledgeSettings | null = null;
  private cached: KnowledgeSnapshot | null = null;
  private listeners = new Set<KnowledgeListener>();

  public initialize(settings: KnowledgeSettings): KnowledgeSnapshot {
    this.settings = {
      baseLocation: { ...settings.baseLocation },
      capacity: settings.capacity,
      missionTimeoutMs: settings.missionTimeoutMs,
      houses: settings.houses.map((house) => ({ x: house.x, y: house.y })),
    };
    const revision = this.state ? this.state.revision + 1 : 0;
    this.state = { ...createInitialKnowledge(this.settings), revision };
    this.cached = null;

    logger.info("🧠 Knowledge initialized", LogCategory.KNOWLEDGE, {
      capacity: settings.capacity,
      missionTimeoutMs: settings.missionTimeoutMs,
    });

    const snapshot = this.snapshotOrThrow();
    this.emit({ snapshot, changed: true, fields: [...KNOWLEDGE_FIELDS] });
    return snapshot;
  }

  public isInitialized(): boolean {
    return this.state !== null;
  }

  /**
   * @returns frozen copy of the state, or null before `initialize`
   */
  public snapshot(): KnowledgeSnapshot | null {
    if (!this.state) {
      return null;
    }
    if (!this.cached) {
      this.cached = frozenClone(this.state);
    }
    return this.cached;
  }

  private snapshotOrThrow(): KnowledgeSnapshot {
    const snapshot = this.snapshot();
    if (!snapshot) {
      throw new ValidationError("Knowledge is not initialized");
    }
    return snapshot;
  }

  /**
   * Validates and applies a partial update atomically.
   *
   * @throws ValidationError when any field is invalid; state is left unchanged
   */
  public applyUpdate(raw: unknown): KnowledgeChange {
    const current = this.snapshotOrThrow();
    const patch = parseKnowledgePatch(raw, current);
    return this.commit(patch, current);
  }

  /**
   * Appends a pending order. Ids are unique for the lifetime of the state.
   *
   * @throws InvalidCellError when the destination is not a house
   */
  public addOrder(order: NewOrder): KnowledgeChange {
    const current = this.snapshotOrThrow();
    if (current.orders.some((existing) => existing.id === order.id)) {
      throw new ValidationError(`Order ${order.id} already exists`);
    }
    if (!isCoordinate(order.destination)) {
      throw new ValidationError(`Order ${order.id} has an invalid destination`);
    }
    const houses = this.settings?.houses ?? [];
    if (!houses.some((house) => samePoint(house, order.destination))) {
      throw new InvalidCellError(order.destination, "not a delivery house");
    }

    const orders: Order[] = current.orders.map((existing) => ({
      ...existing,
      destination: { ...existing.destination },
    }));
    orders.push({
      id: order.id,
      destination: { x: order.destination.x, y: order.destination.y },
      status: OrderStatus.PENDING,
      createdAt: order.createdAt,
      loadedAt: null,
      deliveredAt: null,
    });
    return this.commit({ orders }, current);
  }

  /**
   * Back to the initial state built from the stored settings, metrics included.
   */
  public reset(): KnowledgeSnapshot {
    if (!this.settings) {
      throw new ValidationError("Knowledge is not initialized");
    }
    return this.initialize(this.settings);
  }

  public subscribe(listener: KnowledgeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private commit(
    patch: KnowledgePatch,
    current: KnowledgeSnapshot,
  ): KnowledgeChange {
    const state = this.state;
    if (!state) {
      throw new ValidationError("Knowledge is not initialized");
    }

    const next: KnowledgeState = { ...state, ...patch };
    const fields = KNOWLEDGE_FIELDS.filter(
      (field) =>
        patch[field] !== undefined &&
        !isDeepStrictEqual(current[field], next[field]),
    );

    if (fields.length === 0) {
      const change: KnowledgeChange = { snapshot: current, changed: false, fields };
      this.emit(change);
      return change;
    }

    next.revision = state.revision + 1;
    this.state = next;
    this.cached = null;

    const snapshot = this.snapshotOrThrow();
    logger.debug(`Knowledge r${snapshot.revision}: ${fields.join(", ")}`, LogCategory.KNOWLEDGE);

    const change: KnowledgeChange = { snapshot, changed: true, fields };
    this.emit(change);
    return change;
  }

  private emit(change: KnowledgeChange): void {
    for (const listener of this.listeners) {
      try {
        listener(change);
      } catch (error) {
        logger.error("Knowledge listener failed", LogCategory.KNOWLEDGE, {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }
}
