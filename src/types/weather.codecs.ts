import { z } from 'zod';

const ConditionCodec = z.object({ text: z.string() });

const LocationCodec = z.object({
  name: z.string(),
  region: z.string().optional(),
  country: z.string(),
  localtime: z.string().optional(),
});

export const CurrentConditionsCodec = z.object({
  temp_c: z.number(),
  feelslike_c: z.number(),
  condition: ConditionCodec,
  humidity: z.number(),
  wind_kph: z.number(),
  wind_dir: z.string(),
  gust_kph: z.number(),
  vis_km: z.number(),
  uv: z.number(),
  precip_mm: z.number(),
});

export const CurrentWeatherResponseCodec = z.object({
  location: LocationCodec,
  current: CurrentConditionsCodec,
});
export type CurrentWeatherResponse = z.infer<typeof CurrentWeatherResponseCodec>;

const ForecastHourCodec = z.object({
  time: z.string(),
  temp_c: z.number(),
  condition: ConditionCodec,
  chance_of_rain: z.number(),
  wind_kph: z.number(),
});

export const ForecastDayCodec = z.object({
  date: z.string(),
  day: z.object({
    condition: ConditionCodec,
    maxtemp_c: z.number(),
    mintemp_c: z.number(),
    avgtemp_c: z.number(),
    daily_chance_of_rain: z.number(),
    totalprecip_mm: z.number(),
    maxwind_kph: z.number(),
  }),
  astro: z.object({
    sunrise: z.string(),
    sunset: z.string(),
    moon_phase: z.string(),
  }),
  hour: z.array(ForecastHourCodec),
});
export type ForecastDay = z.infer<typeof ForecastDayCodec>;

export const ForecastResponseCodec = z.object({
  location: LocationCodec,
  forecast: z.object({ forecastday: z.array(ForecastDayCodec) }),
});
export type ForecastResponse = z.infer<typeof ForecastResponseCodec>;

export const WeatherApiErrorCodec = z.object({
  error: z.object({ code: z.number().optional(), message: z.string() }),
});

export const IpInfoCodec = z.object({
  ip: z.string().optional(),
  city: z.string(),
  region: z.string(),
  country: z.string(),
  loc: z.string().optional(),
  timezone: z.string().optional(),
});
export type IpInfo = z.infer<typeof IpInfoCodec>;
