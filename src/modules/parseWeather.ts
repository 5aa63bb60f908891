import { CurrentWeatherResponse } from '../interfaces/weather';
import { MalformedResponse } from '../interfaces/weatherResult';
import { CurrentWeatherSchema, ErrorBodySchema } from '../schemas/openWeather.schema';

export type ParsedWeather =
  | { success: true; data: CurrentWeatherResponse; raw: unknown }
  | { success: false; error: MalformedResponse };

function decodeJson(body: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(body) };
  } catch {
    return { ok: false };
  }
}

export function parseWeatherResponse(body: string): ParsedWeather {
  const decoded = decodeJson(body);

  if (!decoded.ok) {
    return {
      success: false,
      error: {
        kind: 'MalformedResponse',
        message: 'Response body is not valid JSON',
      },
    };
  }

  const parsed = CurrentWeatherSchema.safeParse(decoded.value);

  if (!parsed.success) {
    return {
      success: false,
      error: {
        kind: 'MalformedResponse',
        message: 'Weather API schema mismatch',
        issues: parsed.error.issues.map(
          (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
        ),
      },
    };
  }

  return { success: true, data: parsed.data, raw: decoded.value };
}

/**
 * Diagnostic text of an error body, if the server sent one.
 * Non-JSON bodies (proxy pages, empty replies) carry no details.
 */
export function extractRemoteMessage(body: string): string | undefined {
  const decoded = decodeJson(body);
  if (!decoded.ok) return undefined;

  const parsed = ErrorBodySchema.safeParse(decoded.value);
  return parsed.success ? parsed.data.message : undefined;
}
