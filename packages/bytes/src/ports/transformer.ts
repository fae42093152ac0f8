/**
 * A bit- or byte-level operation over a buffer.
 *
 * @remarks
 * Contract, enforced by the dispatcher:
 * - `inPlace === true`: mutate `buffer` and return that same object.
 * - `inPlace === false`: leave `buffer` untouched and return a freshly
 *   allocated array, even when the operation could have run in place.
 *
 * `inPlace` is only ever `true` when {@link supportsInPlace} said so.
 */
export interface BytesTransformer {
  /** Identifier used in logs and error context, e.g. `"xor"`. */
  readonly name: string

  apply(buffer: Uint8Array, inPlace: boolean): Uint8Array

  supportsInPlace(): boolean
}
