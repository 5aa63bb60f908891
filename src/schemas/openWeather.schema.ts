import { z } from "zod";

export const UnitsSchema = z.enum(["metric", "imperial", "standard"]);

/* ------------------ Success payload ------------------ */

export const MainSchema = z.object({
  temp: z.number().finite(),
  feels_like: z.number().finite(),
  humidity: z.number().finite(),
  pressure: z.number().finite(),
  temp_min: z.number().finite(),
  temp_max: z.number().finite(),
});

export const WindSchema = z.object({
  speed: z.number().finite(),
});

export const ConditionSchema = z.object({
  description: z.string(),
});

// country is absent for some places (oceans, disputed areas)
export const SysSchema = z.object({
  country: z.string().nullish(),
});

export const CurrentWeatherSchema = z.object({
  main: MainSchema,
  wind: WindSchema,
  weather: z.array(ConditionSchema).min(1),
  sys: SysSchema.nullish(),
});

/* ------------------ Error payload ------------------ */

export const ErrorBodySchema = z.object({
  cod: z.union([z.string(), z.number()]).optional(),
  message: z.string().optional(),
});
