import { EventEmitter } from "events";

type Listener = (...args: never[]) => void;
type EventKey<TEvents> = Extract<keyof TEvents, string>;
type EventListener<TEvents, TKey extends EventKey<TEvents>> = TEvents[TKey] extends Listener
    ? TEvents[TKey]
    : never;
type EventArgs<TEvents, TKey extends EventKey<TEvents>> = TEvents[TKey] extends (
    ...args: infer TArgs
) => void
    ? TArgs
    : never;

/**
 * EventEmitter whose event names and listener signatures come from an event map.
 * The untyped overloads stay so the class remains assignable to EventEmitter.
 */
export class TypedEventEmitter<TEvents extends object> extends EventEmitter {
    on<K extends EventKey<TEvents>>(event: K, listener: EventListener<TEvents, K>): this;
    on(eventName: string | symbol, listener: (...args: any[]) => void): this;
    on(eventName: string | symbol, listener: (...args: any[]) => void): this {
        return super.on(eventName, listener);
    }

    once<K extends EventKey<TEvents>>(event: K, listener: EventListener<TEvents, K>): this;
    once(eventName: string | symbol, listener: (...args: any[]) => void): this;
    once(eventName: string | symbol, listener: (...args: any[]) => void): this {
        return super.once(eventName, listener);
    }

    off<K extends EventKey<TEvents>>(event: K, listener: EventListener<TEvents, K>): this;
    off(eventName: string | symbol, listener: (...args: any[]) => void): this;
    off(eventName: string | symbol, listener: (...args: any[]) => void): this {
        return super.off(eventName, listener);
    }

    emit<K extends EventKey<TEvents>>(event: K, ...args: EventArgs<TEvents, K>): boolean;
    emit(eventName: string | symbol, ...args: any[]): boolean;
    emit(eventName: string | symbol, ...args: any[]): boolean {
        return super.emit(eventName, ...args);
    }
}
