import { z } from "zod";
import {
  CurrentWeatherSchema,
  UnitsSchema,
} from "../schemas/openWeather.schema";

export type Units = z.infer<typeof UnitsSchema>;

export type CurrentWeatherResponse = z.infer<typeof CurrentWeatherSchema>;
