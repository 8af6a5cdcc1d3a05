import { injectable } from "inversify";
import type {
  ChannelHandler,
  ChannelName,
  Envelope,
  MessageBus,
} from "../bus/MessageBus";

/**
 * Base for loop components: one handler per consumed channel, registered on
 * `attach()` and removed on `detach()`.
 */
@injectable()
export abstract class BusComponent {
  protected abstract readonly componentName: string;
  private subscriptions: Array<() => void> = [];

  constructor(protected readonly bus: MessageBus) {}

  protected abstract registerHandlers(): void;

  public attach(): void {
    if (this.attached) {
      return;
    }
    this.registerHandlers();
  }

  public detach(): void {
    for (const unsubscribe of this.subscriptions) {
      unsubscribe();
    }
    this.subscriptions = [];
  }

  public get attached(): boolean {
    return this.subscriptions.length > 0;
  }

  protected listen<C extends ChannelName>(
    channel: C,
    handler: ChannelHandler<C>,
  ): void {
    this.subscriptions.push(this.bus.subscribe(channel, handler));
  }

  /**
   * Registers a teardown that runs on `detach()`.
   */
  protected track(unsubscribe: () => void): void {
    this.subscriptions.push(unsubscribe);
  }

  protected envelope(tick: number): Envelope {
    return { tick, timestamp: Date.now() };
  }
}
