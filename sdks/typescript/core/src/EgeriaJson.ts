import { InvalidParameterException, isRecord } from './EgeriaException.js';

/**
 * Static helper for JSON serialization used by every request the SDK sends.
 *
 * USE THIS INSTEAD OF JSON.parse/stringify DIRECTLY so that:
 * - Null/undefined values are omitted when serializing
 * - Parse failures surface as `InvalidParameterException` where a body is required
 *
 * @example
 * ```typescript
 * const body = EgeriaJson.deserializeRequired(text, url);
 * const json = EgeriaJson.serialize({ class: 'FilterRequestBody', filter: 'Sales' });
 * ```
 */
export class EgeriaJson {
  /**
   * Parses JSON text.
   * @returns The parsed value, or null if parsing fails
   */
  static deserialize(json: string): unknown {
    try {
      return JSON.parse(json);
    } catch {
      return null;
    }
  }

  /**
   * Parses JSON text, throwing when it is not JSON.
   * @param source - Where the text came from, reported in the exception
   * @throws InvalidParameterException if the text is not JSON
   */
  static deserializeRequired(json: string, source = 'response'): unknown {
    try {
      return JSON.parse(json);
    } catch (error) {
      throw new InvalidParameterException(`${source} did not contain valid JSON`, {
        cause: error,
        additionalInfo: { endpoint: source },
      });
    }
  }

  /**
   * Serializes a value, omitting null and undefined members.
   */
  static serialize(value: unknown): string {
    return JSON.stringify(value, (_, v: unknown) => {
      if (v === null || v === undefined) {
        return undefined;
      }
      return v;
    });
  }
}

/**
 * Removes empty members from a request body before it is sent.
 *
 * Keys whose value is null, undefined, false, 0, an empty string, an empty
 * array or an object that is empty after slimming are dropped. Nested objects
 * (including objects inside arrays) are slimmed recursively.
 */
export function bodySlimmer(body: Record<string, unknown>): Record<string, unknown> {
  const slim: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(body)) {
    const kept = slimValue(value);
    if (kept !== undefined) {
      slim[key] = kept;
    }
  }
  return slim;
}

function slimValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    if (value.length === 0) {
      return undefined;
    }
    return value.map((item: unknown) => (isRecord(item) ? bodySlimmer(item) : item));
  }
  if (isRecord(value)) {
    const nested = bodySlimmer(value);
    return Object.keys(nested).length === 0 ? undefined : nested;
  }
  return value ? value : undefined;
}

/**
 * Extension function to parse a JSON string.
 * @returns The parsed value, or null if parsing fails
 */
export function fromJson(json: string): unknown {
  return EgeriaJson.deserialize(json);
}

/**
 * Extension function to serialize a value to JSON.
 */
export function toJson(value: unknown): string {
  return EgeriaJson.serialize(value);
}
