/**
 * Message body serializers.
 */

import { decode, encode } from '@msgpack/msgpack';
import { SerializationError, toError } from './errors';

export type SerializationFormat = 'json' | 'msgpack';

export const SERIALIZATION_FORMATS: readonly SerializationFormat[] = ['json', 'msgpack'];

/**
 * Header that tells consumers how a body was serialized.
 */
export const SERIALIZATION_HEADER = 'serialization_format';

export interface Serializer {
  readonly format: SerializationFormat;
  readonly contentType: string;
  serialize(data: unknown): Buffer;
  deserialize(body: Buffer | string): unknown;
}

export class JsonSerializer implements Serializer {
  readonly format = 'json';
  readonly contentType = 'application/json';

  serialize(data: unknown): Buffer {
    let json: string | undefined;
    try {
      json = JSON.stringify(data);
    } catch (error) {
      throw new SerializationError(`JSON serialization error: ${toError(error).message}`, { cause: error });
    }

    if (json === undefined) {
      throw new SerializationError(`JSON serialization error: cannot encode ${typeof data}`);
    }

    return Buffer.from(json, 'utf8');
  }

  deserialize(body: Buffer | string): unknown {
    const text = typeof body === 'string' ? body : body.toString('utf8');
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new SerializationError(`JSON deserialization error: ${toError(error).message}`, { cause: error });
    }
  }
}

export class MessagePackSerializer implements Serializer {
  readonly format = 'msgpack';
  readonly contentType = 'application/x-msgpack';

  serialize(data: unknown): Buffer {
    try {
      const packed = encode(data);
      return Buffer.from(packed.buffer, packed.byteOffset, packed.byteLength);
    } catch (error) {
      throw new SerializationError(`MessagePack serialization error: ${toError(error).message}`, { cause: error });
    }
  }

  deserialize(body: Buffer | string): unknown {
    const bytes = typeof body === 'string' ? Buffer.from(body, 'binary') : body;
    try {
      return decode(bytes);
    } catch (error) {
      throw new SerializationError(`MessagePack deserialization error: ${toError(error).message}`, { cause: error });
    }
  }
}

export const isSerializationFormat = (value: unknown): value is SerializationFormat =>
  typeof value === 'string' && SERIALIZATION_FORMATS.some((format) => format === value);

/**
 * Creates the serializer for a format.
 *
 * @throws SerializationError for an unsupported format
 */
export const createSerializer = (format: string): Serializer => {
  if (! isSerializationFormat(format)) {
    throw new SerializationError(`Unsupported serialization format: ${format}`);
  }

  switch (format) {
    case 'json':
      return new JsonSerializer();
    case 'msgpack':
      return new MessagePackSerializer();
  }
};
