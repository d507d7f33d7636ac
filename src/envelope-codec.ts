import { attempt, type Codec, type CodecResult } from "./codec.js";

/**
 * Fixed phrase wrapped around every encoded string.
 */
export interface Envelope {
  prefix: string;
  suffix: string;
}

/**
 * A codec that frames another codec's output in a fixed prefix and suffix.
 */
export class EnvelopeCodec implements Codec {
  readonly inner: Codec;
  readonly envelope: Envelope;

  constructor(inner: Codec, envelope: Envelope) {
    this.inner = inner;
    this.envelope = envelope;
  }

  /**
   * Encode with the inner codec and wrap the result.
   * @param text - The string to encode
   * @returns prefix + encoded text + suffix
   */
  encode(text: string): string {
    return this.wrap(this.inner.encode(text));
  }

  /**
   * Strip the envelope when present and decode with the inner codec.
   * Input without a complete envelope reaches the inner codec unchanged.
   * @param text - The string to decode
   * @returns The decoded string
   */
  decode(text: string): string {
    return this.inner.decode(this.unwrap(text));
  }

  tryEncode(text: string): CodecResult<string> {
    return attempt(() => this.encode(text));
  }

  tryDecode(text: string): CodecResult<string> {
    return attempt(() => this.decode(text));
  }

  wrap(body: string): string {
    return this.envelope.prefix + body + this.envelope.suffix;
  }

  unwrap(text: string): string {
    const { prefix, suffix } = this.envelope;
    if (
      text.length >= prefix.length + suffix.length &&
      text.startsWith(prefix) &&
      text.endsWith(suffix)
    ) {
      return text.slice(prefix.length, text.length - suffix.length);
    }
    return text;
  }
}
