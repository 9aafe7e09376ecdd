import {
  conditionFromWeatherCode,
  createWeatherSummary,
  type WeatherSummary,
} from "./weather-summary.ts";

export type WeatherClientErrorCode =
  | "geocode_failed"
  | "postal_code_not_found"
  | "forecast_failed"
  | "invalid_response"
  | "timeout";

export class WeatherClientError extends Error {
  readonly code: WeatherClientErrorCode;
  readonly transient: boolean;
  readonly status: number | null;

  constructor(
    code: WeatherClientErrorCode,
    message: string,
    options: { transient: boolean; status?: number | null },
  ) {
    super(message);
    this.name = "WeatherClientError";
    this.code = code;
    this.transient = options.transient;
    this.status = options.status ?? null;
  }
}

export type GeoLocation = {
  latitude: number;
  longitude: number;
  place_name: string | null;
  state: string | null;
};

export type DailySummaryRequest = {
  latitude: number;
  longitude: number;
  date: string;
};

export interface WeatherClient {
  geocodePostalCode(postalCode: string): Promise<GeoLocation>;
  getDailySummary(request: DailySummaryRequest): Promise<WeatherSummary>;
}

const FORECAST_ENDPOINT = "https://api.open-meteo.com/v1/forecast";
const ARCHIVE_ENDPOINT = "https://archive-api.open-meteo.com/v1/archive";
const GEOCODE_ENDPOINT = "https://api.zippopotam.us/de";
const DAILY_FIELDS = [
  "weather_code",
  "temperature_2m_max",
  "temperature_2m_min",
  "precipitation_sum",
  "precipitation_probability_max",
  "wind_speed_10m_max",
] as const;

export function createOpenMeteoWeatherClient(params?: {
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
  timezone?: string;
  today?: () => string;
}): WeatherClient {
  const fetchImpl = params?.fetchImpl ?? fetch;
  const timeoutMs = params?.timeoutMs ?? 8000;
  const timezone = params?.timezone ?? "Europe/Berlin";
  const today = params?.today ?? (() => new Date().toISOString().slice(0, 10));

  const requestJson = async (
    url: string,
    failureCode: WeatherClientErrorCode,
  ): Promise<unknown> => {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    let response: Response;
    try {
      response = await fetchImpl(url, { signal: controller.signal });
    } catch (error) {
      const isAbort = error instanceof Error && error.name === "AbortError";
      throw new WeatherClientError(
        isAbort ? "timeout" : failureCode,
        isAbort ? "Weather request timed out." : "Weather request network failure.",
        { transient: true },
      );
    } finally {
      clearTimeout(timeoutId);
    }

    if (!response.ok) {
      if (failureCode === "geocode_failed" && response.status === 404) {
        throw new WeatherClientError("postal_code_not_found", "Postal code is unknown.", {
          transient: false,
          status: 404,
        });
      }
      throw new WeatherClientError(failureCode, "Weather service returned non-OK status.", {
        transient: response.status === 429 || response.status >= 500,
        status: response.status,
      });
    }

    try {
      return await response.json();
    } catch {
      throw new WeatherClientError("invalid_response", "Weather service returned non-JSON payload.", {
        transient: false,
        status: response.status,
      });
    }
  };

  return {
    async geocodePostalCode(postalCode: string): Promise<GeoLocation> {
      const body = await requestJson(
        `${GEOCODE_ENDPOINT}/${encodeURIComponent(postalCode)}`,
        "geocode_failed",
      );
      const places = isRecord(body) && Array.isArray(body.places) ? body.places : [];
      const first: unknown = places[0];
      if (!isRecord(first)) {
        throw new WeatherClientError("postal_code_not_found", "No places found for postal code.", {
          transient: false,
        });
      }

      const latitude = Number(first.latitude);
      const longitude = Number(first.longitude);
      if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) {
        throw new WeatherClientError("invalid_response", "Geocoding returned invalid coordinates.", {
          transient: false,
        });
      }
      return {
        latitude,
        longitude,
        place_name: typeof first["place name"] === "string" ? first["place name"] : null,
        state: typeof first.state === "string" ? first.state : null,
      };
    },

    async getDailySummary(request: DailySummaryRequest): Promise<WeatherSummary> {
      const endpoint = request.date < today() ? ARCHIVE_ENDPOINT : FORECAST_ENDPOINT;
      const query = new URLSearchParams({
        latitude: String(request.latitude),
        longitude: String(request.longitude),
        daily: DAILY_FIELDS.join(","),
        timezone,
        start_date: request.date,
        end_date: request.date,
      });
      const body = await requestJson(`${endpoint}?${query.toString()}`, "forecast_failed");
      const daily = isRecord(body) && isRecord(body.daily) ? body.daily : null;
      if (!daily) {
        throw new WeatherClientError("invalid_response", "Forecast response is missing daily data.", {
          transient: false,
        });
      }

      return createWeatherSummary(conditionFromWeatherCode(firstNumber(daily.weather_code)), {
        temperature_min_c: firstNumber(daily.temperature_2m_min),
        temperature_max_c: firstNumber(daily.temperature_2m_max),
        precipitation_probability_pct: firstNumber(daily.precipitation_probability_max),
        precipitation_sum_mm: firstNumber(daily.precipitation_sum),
        wind_speed_max_kmh: firstNumber(daily.wind_speed_10m_max),
      });
    },
  };
}

function firstNumber(value: unknown): number | null {
  if (!Array.isArray(value)) {
    return null;
  }
  const first: unknown = value[0];
  return typeof first === "number" && Number.isFinite(first) ? first : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
