import { v4 as uuidv4 } from "uuid";
import { LoggingService, LogLevel } from "../logging/LoggingService";
import { BoundedChannel } from "./BoundedChannel";
import type { DeliveryEvent } from "../../types";

export class Subscription implements AsyncIterable<DeliveryEvent> {
  readonly id = uuidv4();
  private readonly channel: BoundedChannel<DeliveryEvent>;
  private readonly onClose: (subscription: Subscription) => void;

  constructor(
    capacity: number,
    onClose: (subscription: Subscription) => void,
    onDrop: (subscription: Subscription, event: DeliveryEvent) => void
  ) {
    this.channel = new BoundedChannel(capacity, (event) => onDrop(this, event));
    this.onClose = onClose;
  }

  get dropped(): number {
    return this.channel.droppedCount;
  }

  get closed(): boolean {
    return this.channel.isClosed;
  }

  offer(event: DeliveryEvent): boolean {
    return this.channel.push(event);
  }

  next(): Promise<IteratorResult<DeliveryEvent, undefined>> {
    return this.channel.next();
  }

  close(): void {
    if (!this.channel.isClosed) {
      this.channel.close();
      this.onClose(this);
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<DeliveryEvent, undefined> {
    return {
      next: () => this.channel.next(),
      return: () => {
        this.close();
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }
}

/**
 * Fans delivery events out to any number of subscribers. A slow subscriber
 * loses its oldest queued events and never holds up the publisher or the
 * other subscribers.
 */
export class DeliverySink {
  private readonly subscribers = new Set<Subscription>();
  private readonly capacity: number;
  private closed = false;
  private logger: LoggingService;

  constructor(options: { capacity: number }) {
    this.capacity = options.capacity;
    this.logger = LoggingService.getInstance();
  }

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  subscribe(): Subscription {
    const subscription = new Subscription(
      this.capacity,
      (closed) => this.subscribers.delete(closed),
      (slow, event) =>
        this.logger.log(LogLevel.DEBUG, "Dropped event for slow subscriber", "DeliverySink", {
          subscriptionId: slow.id,
          type: event.type,
          dropped: slow.dropped,
        })
    );
    if (this.closed) {
      subscription.close();
    } else {
      this.subscribers.add(subscription);
    }
    return subscription;
  }

  publish(event: DeliveryEvent): void {
    if (this.closed) {
      return;
    }
    for (const subscription of this.subscribers) {
      subscription.offer(event);
    }
  }

  close(): void {
    this.closed = true;
    for (const subscription of [...this.subscribers]) {
      subscription.close();
    }
  }
}
