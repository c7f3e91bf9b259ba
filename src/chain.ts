// src/chain.ts
import type { OutboundRequest, OutboundResponse, Transport, TransportDecorator } from "./types.js";

/** Adapts a plain function to the Transport interface. */
export function transportFunc(roundTrip: (req: OutboundRequest) => Promise<OutboundResponse>): Transport {
  return { roundTrip };
}

/**
 * Wraps `base` so that the first decorator is the outermost one:
 * composeTransport([d1, d2, d3], t) === d1(d2(d3(t))).
 */
export function composeTransport(decorators: readonly TransportDecorator[], base: Transport): Transport {
  let transport = base;
  for (let i = decorators.length - 1; i >= 0; i--) {
    transport = decorators[i](transport);
  }
  return transport;
}

/** Immutable ordered list of decorators, outermost first. */
export class TransportChain {
  private readonly decorators: readonly TransportDecorator[];

  constructor(decorators: readonly TransportDecorator[] = []) {
    this.decorators = [...decorators];
  }

  get length(): number {
    return this.decorators.length;
  }

  /** Adds decorators on the inside of the chain, closest to the base transport. */
  append(...decorators: TransportDecorator[]): TransportChain {
    return new TransportChain([...this.decorators, ...decorators]);
  }

  /** Adds decorators on the outside of the chain. */
  prepend(...decorators: TransportDecorator[]): TransportChain {
    return new TransportChain([...decorators, ...this.decorators]);
  }

  apply(base: Transport): Transport {
    return composeTransport(this.decorators, base);
  }
}
