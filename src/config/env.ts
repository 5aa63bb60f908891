import fs from "fs";
import { z } from "zod";
import { UnitsSchema } from "../schemas/openWeather.schema";
import { DEFAULT_OUTPUT_DIR } from "../modules/responseStore";
import { DEFAULT_TIMEOUT_MS } from "../modules/getWeather";

const SECRETS_PREFIX = "/run/secrets/";

// dotenv leaves unset-but-declared variables as ""
const emptyAsUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

export function resolveSecret(value: string): string {
  // Docker secrets path
  if (value.startsWith(SECRETS_PREFIX)) {
    return fs.readFileSync(value, "utf8").trim();
  }
  // Local dev: literal value
  return value;
}

export const EnvSchema = z.object({
  OPENWEATHER_API_KEY: z.preprocess(
    emptyAsUndefined,
    z
      .string({ required_error: "OPENWEATHER_API_KEY is not set" })
      .trim()
      .transform((value, ctx) => {
        try {
          return resolveSecret(value);
        } catch {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Cannot read secret file ${value}`,
          });
          return z.NEVER;
        }
      })
  ),
  OPENWEATHER_BASE_URL: z.preprocess(emptyAsUndefined, z.string().url().optional()),
  WEATHER_UNITS: z.preprocess(emptyAsUndefined, UnitsSchema.default("metric")),
  WEATHER_CITIES: z.preprocess(emptyAsUndefined, z.string().optional()),
  WEATHER_OUTPUT_DIR: z.preprocess(emptyAsUndefined, z.string().default(DEFAULT_OUTPUT_DIR)),
  WEATHER_SAVE_RESPONSES: z.preprocess(
    emptyAsUndefined,
    z
      .enum(["true", "false", "1", "0"])
      .default("false")
      .transform((value) => value === "true" || value === "1")
  ),
  WEATHER_TIMEOUT_MS: z.preprocess(
    emptyAsUndefined,
    z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS)
  ),
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return EnvSchema.parse(source);
}

export function parseCityList(value: string | undefined): string[] {
  return (value ?? "")
    .split(",")
    .map((city) => city.trim())
    .filter((city) => city.length > 0);
}
