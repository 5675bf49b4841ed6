/**
 * Bounded async channel
 *
 * `send` waits while the buffer is full, `receive` waits while it is
 * empty. Closing wakes every waiter: pending sends resolve to `false`,
 * pending receives end once the buffered items are drained.
 */
export class Channel<T> {
    private readonly items: Array<{ value: T }> = [];
    private readonly receivers: Array<(result: IteratorResult<T, undefined>) => void> = [];
    private readonly senders: Array<() => void> = [];
    private closed = false;

    constructor(readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
        }
    }

    get isClosed(): boolean {
        return this.closed;
    }

    get size(): number {
        return this.items.length;
    }

    /**
     * @returns false when the channel was closed before the item was accepted
     */
    async send(value: T): Promise<boolean> {
        while (!this.closed && this.receivers.length === 0 && this.items.length >= this.capacity) {
            await new Promise<void>((resolve) => this.senders.push(resolve));
        }
        if (this.closed) {
            return false;
        }
        const receiver = this.receivers.shift();
        if (receiver) {
            receiver({ done: false, value });
        } else {
            this.items.push({ value });
        }
        return true;
    }

    async receive(): Promise<IteratorResult<T, undefined>> {
        const next = this.items.shift();
        if (next) {
            this.senders.shift()?.();
            return { done: false, value: next.value };
        }
        if (this.closed) {
            return { done: true, value: undefined };
        }
        return new Promise((resolve) => this.receivers.push(resolve));
    }

    /**
     * Close the channel. With `discard`, buffered items are dropped instead
     * of being handed to later receives.
     */
    close(discard = false): void {
        this.closed = true;
        if (discard) {
            this.items.length = 0;
        }
        for (const receiver of this.receivers.splice(0)) {
            receiver({ done: true, value: undefined });
        }
        for (const sender of this.senders.splice(0)) {
            sender();
        }
    }
}
