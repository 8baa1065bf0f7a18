/**
 * Branded / Opaque type utility.
 * Prevents accidental interchange of structurally identical primitives,
 * e.g. passing a delivery id where an endpoint id is expected.
 */
declare const __brand: unique symbol;

export type Brand<T, B extends string> = T & { readonly [__brand]: B };

export type EndpointId = Brand<string, "EndpointId">;
export type DeliveryId = Brand<string, "DeliveryId">;
export type OwnerId = Brand<string, "OwnerId">;
export type RequestId = Brand<string, "RequestId">;

/** Helper to create branded values (runtime no-op, compile-time safety) */
export const brand = <T, B extends string>(value: T): Brand<T, B> => value as Brand<T, B>;
