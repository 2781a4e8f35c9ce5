import type { ResourceDecoder } from './codec/index.js';
import type { Meta } from './types/index.js';

/**
 * Receives one decoded resource
 */
export class SingleSink<T> {
  public readonly kind = 'single';

  public readonly model: ResourceDecoder<T>;

  /**
   * Decoded resource, set after a successful request
   */
  public value: T | undefined = undefined;

  /**
   * Top-level `meta` of the response document
   */
  public meta: Meta | undefined = undefined;

  /**
   * Top-level `links` of the response document
   */
  public links: Meta | undefined = undefined;

  constructor(model: ResourceDecoder<T>) {
    this.model = model;
  }
}

/**
 * Receives a list of decoded resources in response order
 */
export class CollectionSink<T> {
  public readonly kind = 'collection';

  public readonly model: ResourceDecoder<T>;

  public items: T[] = [];

  public meta: Meta | undefined = undefined;

  public links: Meta | undefined = undefined;

  constructor(model: ResourceDecoder<T>) {
    this.model = model;
  }
}

/**
 * Output destination of a request, discriminated by `kind`
 */
export type OutputSink<T> = SingleSink<T> | CollectionSink<T>;

/**
 * Decode the response into a single resource of the given model
 */
export function intoOne<T>(model: ResourceDecoder<T>): SingleSink<T> {
  return new SingleSink(model);
}

/**
 * Decode the response into a list of resources of the given model
 */
export function intoMany<T>(model: ResourceDecoder<T>): CollectionSink<T> {
  return new CollectionSink(model);
}
