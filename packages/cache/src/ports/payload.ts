/**
 * Values a cache entry can hold: JSON data. `null` may appear inside arrays
 * and objects, but a payload itself is never `null`.
 *
 * Anything else (Date, Map, class instances, non-finite numbers, -0) is
 * rejected when written rather than silently changed by the codec.
 */
export type Payload = number | string | boolean | readonly PayloadField[] | PayloadObject

export type PayloadField = Payload | null

export type PayloadObject = { readonly [key: string]: PayloadField }
