import { toolsMetadata } from '../config/metadata.js';
import {
  CurrentWeatherInputSchema,
  FindLocationInputSchema,
  ForecastWeatherInputSchema,
} from '../schemas/inputs.js';
import { CurrentWeatherOutput, ForecastOutput, LocationOutput } from '../schemas/outputs.js';
import { findLocation } from '../services/weather/location.js';
import {
  getCurrentWeather,
  getForecast,
  pickForecastDay,
} from '../services/weather/weather-api.js';
import type { CurrentWeatherResponse, ForecastDay } from '../types/weather.codecs.js';
import { logger } from '../utils/logger.js';
import { validateDev } from '../utils/validate.js';
import { errorResult, textResult } from './result.js';
import { defineTool } from './types.js';

/** Hourly highlights keep every third hour of the day. */
export const HOUR_STRIDE = 3;

export function formatCurrentWeather(response: CurrentWeatherResponse): string {
  const { location, current } = response;
  return [
    `Current Weather in ${location.name}, ${location.country}:`,
    `Temperature: ${current.temp_c}°C (Feels like ${current.feelslike_c}°C)`,
    `Condition: ${current.condition.text}`,
    `Humidity: ${current.humidity}%`,
    `Wind: ${current.wind_kph} km/h ${current.wind_dir} (Gusts up to ${current.gust_kph} km/h)`,
    `Visibility: ${current.vis_km} km`,
    `UV Index: ${current.uv}`,
    `Precipitation: ${current.precip_mm} mm`,
  ].join('\n');
}

/** "2026-01-10 15:00" → "15:00" */
function clockTime(time: string): string {
  return time.split(' ').pop() ?? time;
}

export function formatForecast(location: string, day: ForecastDay): string {
  const header = [
    `Weather Forecast for ${location} on ${day.date}:`,
    `Day Condition: ${day.day.condition.text}`,
    `Max Temperature: ${day.day.maxtemp_c}°C`,
    `Min Temperature: ${day.day.mintemp_c}°C`,
    `Average Temperature: ${day.day.avgtemp_c}°C`,
    `Chance of Rain: ${day.day.daily_chance_of_rain}%`,
    `Total Precipitation: ${day.day.totalprecip_mm} mm`,
    `Max Wind Speed: ${day.day.maxwind_kph} km/h`,
    `Sunrise: ${day.astro.sunrise}`,
    `Sunset: ${day.astro.sunset}`,
    `Moon Phase: ${day.astro.moon_phase}`,
  ].join('\n');

  const hours = day.hour
    .filter((_, i) => i % HOUR_STRIDE === 0)
    .map(
      (h) =>
        `${clockTime(h.time)}: ${h.temp_c}°C, ${h.condition.text}, ` +
        `Rain Chance: ${h.chance_of_rain}%, Wind: ${h.wind_kph} km/h`,
    );

  return `${header}\n\nHourly Forecast Highlights:\n${hours.join('\n')}`;
}

export const findLocationTool = defineTool({
  ...toolsMetadata.find_location,
  inputSchema: FindLocationInputSchema,
  outputSchema: LocationOutput.shape,
  annotations: { readOnlyHint: true, openWorldHint: true },
  handler: async (_args, context) => {
    try {
      const info = await findLocation(context.services.location, context.signal);
      const structured: LocationOutput = {
        _msg: `Current location: ${info.city}, ${info.region}, ${info.country}`,
        city: info.city,
        region: info.region,
        country: info.country,
      };
      return textResult(validateDev(LocationOutput, structured), context);
    } catch (error) {
      logger.error('weather', { tool: 'find_location', error: String(error) });
      return errorResult('Error fetching location', error);
    }
  },
});

export const currentWeatherTool = defineTool({
  ...toolsMetadata.current_weather,
  inputSchema: CurrentWeatherInputSchema,
  outputSchema: CurrentWeatherOutput.shape,
  annotations: { readOnlyHint: true, openWorldHint: true },
  handler: async (args, context) => {
    try {
      const response = await getCurrentWeather(
        context.services.weather,
        args.location,
        context.signal,
      );
      const { current } = response;
      const structured: CurrentWeatherOutput = {
        _msg: formatCurrentWeather(response),
        location: { name: response.location.name, country: response.location.country },
        temp_c: current.temp_c,
        feelslike_c: current.feelslike_c,
        condition: current.condition.text,
        humidity: current.humidity,
        wind_kph: current.wind_kph,
        wind_dir: current.wind_dir,
        gust_kph: current.gust_kph,
        vis_km: current.vis_km,
        uv: current.uv,
        precip_mm: current.precip_mm,
      };
      return textResult(validateDev(CurrentWeatherOutput, structured), context);
    } catch (error) {
      logger.error('weather', { tool: 'current_weather', location: args.location, error: String(error) });
      return errorResult('Error fetching current weather', error);
    }
  },
});

export const forecastWeatherTool = defineTool({
  ...toolsMetadata.forecast_weather,
  inputSchema: ForecastWeatherInputSchema,
  outputSchema: ForecastOutput.shape,
  annotations: { readOnlyHint: true, openWorldHint: true },
  handler: async (args, context) => {
    try {
      const response = await getForecast(
        context.services.weather,
        args.location,
        { date: args.date, now: context.services.now() },
        context.signal,
      );
      const day = pickForecastDay(response, args.date);
      if (!day) {
        return errorResult(
          'Error fetching weather forecast',
          new Error(`No forecast days returned for ${args.location}`),
        );
      }
      const structured: ForecastOutput = {
        _msg: formatForecast(args.location, day),
        location: args.location,
        date: day.date,
        condition: day.day.condition.text,
        maxtemp_c: day.day.maxtemp_c,
        mintemp_c: day.day.mintemp_c,
        avgtemp_c: day.day.avgtemp_c,
        daily_chance_of_rain: day.day.daily_chance_of_rain,
        totalprecip_mm: day.day.totalprecip_mm,
        maxwind_kph: day.day.maxwind_kph,
        sunrise: day.astro.sunrise,
        sunset: day.astro.sunset,
        moon_phase: day.astro.moon_phase,
        hours: day.hour
          .filter((_, i) => i % HOUR_STRIDE === 0)
          .map((h) => ({
            time: clockTime(h.time),
            temp_c: h.temp_c,
            condition: h.condition.text,
            chance_of_rain: h.chance_of_rain,
            wind_kph: h.wind_kph,
          })),
      };
      return textResult(validateDev(ForecastOutput, structured), context);
    } catch (error) {
      logger.error('weather', { tool: 'forecast_weather', location: args.location, error: String(error) });
      return errorResult('Error fetching weather forecast', error);
    }
  },
});

export const weatherTools = [findLocationTool, currentWeatherTool, forecastWeatherTool];
