import type { OscArgument, OscHandler } from '../types/osc.js';
import { scoped } from '../logging.js';
import { matches } from './AddressMatcher.js';

const log = scoped('osc-dispatch');

export type HandlerBinding = {
  readonly pattern: string;
  readonly handler: OscHandler;
};

/**
 * Routes messages to every handler whose pattern matches the address.
 * An address may fan out to several handlers; duplicates all fire.
 */
export class Dispatcher {
  private bindings: HandlerBinding[] = [];
  private defaultHandler: OscHandler | undefined;

  register(pattern: string, handler: OscHandler): HandlerBinding {
    if (!pattern.startsWith('/')) {
      throw new Error(`OSC address pattern must start with '/': ${pattern}`);
    }
    const binding: HandlerBinding = { pattern, handler };
    this.bindings = [...this.bindings, binding];
    return binding;
  }

  unregister(binding: HandlerBinding): boolean {
    const before = this.bindings.length;
    this.bindings = this.bindings.filter((b) => b !== binding);
    return this.bindings.length !== before;
  }

  /** Called when no binding matches; pass undefined to clear. */
  setDefaultHandler(handler: OscHandler | undefined): void {
    this.defaultHandler = handler;
  }

  get size(): number {
    return this.bindings.length;
  }

  patterns(): string[] {
    return this.bindings.map((b) => b.pattern);
  }

  match(address: string): HandlerBinding[] {
    return this.bindings.filter((b) => matches(b.pattern, address));
  }

  /**
   * Schedule every matching handler on its own task and return how many were scheduled.
   * Handler failures are logged, never rethrown.
   */
  route(address: string, args: OscArgument[]): number {
    const matched = this.match(address);
    if (matched.length === 0) {
      if (this.defaultHandler) {
        this.schedule('*', this.defaultHandler, address, args);
        return 1;
      }
      log.debug({ address }, 'unhandled OSC address');
      return 0;
    }
    for (const { pattern, handler } of matched) {
      this.schedule(pattern, handler, address, args);
    }
    return matched.length;
  }

  private schedule(
    pattern: string,
    handler: OscHandler,
    address: string,
    args: OscArgument[],
  ): void {
    // deep copy: nested arrays and blob bytes are not shared between handlers
    const copy = structuredClone(args);
    setImmediate(() => {
      void invoke(pattern, handler, address, copy);
    });
  }
}

async function invoke(
  pattern: string,
  handler: OscHandler,
  address: string,
  args: OscArgument[],
): Promise<void> {
  try {
    await handler(address, args);
  } catch (err) {
    log.error({ err, address, pattern }, 'handler threw');
  }
}
