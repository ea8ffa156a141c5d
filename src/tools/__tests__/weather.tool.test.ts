import { describe, expect, test } from 'vitest';

import { currentWeather, forecastDay } from '../../services/weather/__tests__/fixtures.js';
import { executeTool } from '../registry.js';
import { formatCurrentWeather, formatForecast } from '../weather.tool.js';
import { contextFor, firstText, jsonReply, makeServices } from './fake-services.js';

describe('formatCurrentWeather', () => {
  test('lists the current conditions', () => {
    expect(formatCurrentWeather(currentWeather)).toBe(
      'Current Weather in Lisbon, Portugal:\n' +
        'Temperature: 21.5°C (Feels like 22°C)\n' +
        'Condition: Sunny\n' +
        'Humidity: 40%\n' +
        'Wind: 13.7 km/h NW (Gusts up to 18.4 km/h)\n' +
        'Visibility: 10 km\n' +
        'UV Index: 6\n' +
        'Precipitation: 0 mm',
    );
  });
});

describe('formatForecast', () => {
  const lines = formatForecast('Lisbon', forecastDay('2026-01-11')).split('\n');

  test('summarises the day', () => {
    expect(lines.slice(0, 11)).toEqual([
      'Weather Forecast for Lisbon on 2026-01-11:',
      'Day Condition: Patchy rain nearby',
      'Max Temperature: 18.2°C',
      'Min Temperature: 11.4°C',
      'Average Temperature: 14.6°C',
      'Chance of Rain: 70%',
      'Total Precipitation: 2.1 mm',
      'Max Wind Speed: 24.5 km/h',
      'Sunrise: 07:31 AM',
      'Sunset: 06:22 PM',
      'Moon Phase: Waxing Gibbous',
    ]);
  });

  test('highlights every third hour', () => {
    expect(lines.slice(11, 13)).toEqual(['', 'Hourly Forecast Highlights:']);
    const hours = lines.slice(13);
    expect(hours).toHaveLength(8);
    expect(hours[0]).toBe('00:00: 10°C, Cloudy, Rain Chance: 0%, Wind: 5 km/h');
    expect(hours[1]).toBe('03:00: 11.5°C, Cloudy, Rain Chance: 6%, Wind: 8 km/h');
    expect(hours[7]).toBe('21:00: 20.5°C, Light rain, Rain Chance: 42%, Wind: 26 km/h');
  });
});

describe('current_weather', () => {
  test('returns formatted conditions', async () => {
    const services = makeServices({ weatherHttp: jsonReply(currentWeather) });
    const result = await executeTool('current_weather', { location: 'Lisbon' }, contextFor(services));

    expect(firstText(result)).toBe(formatCurrentWeather(currentWeather));
    expect(result.structuredContent).toMatchObject({ condition: 'Sunny', wind_dir: 'NW' });
  });

  test('prefixes vendor errors', async () => {
    const services = makeServices({
      weatherHttp: jsonReply({ error: { code: 2008, message: 'API key has been disabled.' } }, 403),
    });
    const result = await executeTool('current_weather', { location: 'Lisbon' }, contextFor(services));

    expect(result.isError).toBe(true);
    expect(firstText(result)).toBe('Error fetching current weather: Access denied by the service.');
  });
});

describe('forecast_weather', () => {
  test('picks the requested day', async () => {
    const services = makeServices({
      weatherHttp: jsonReply({
        location: { name: 'Lisbon', country: 'Portugal' },
        forecast: { forecastday: [forecastDay('2026-01-10'), forecastDay('2026-01-11')] },
      }),
    });
    const result = await executeTool(
      'forecast_weather',
      { location: 'Lisbon', date: '2026-01-11' },
      contextFor(services),
    );

    expect(firstText(result)?.split('\n')[0]).toBe('Weather Forecast for Lisbon on 2026-01-11:');
    expect(result.structuredContent).toMatchObject({ date: '2026-01-11', moon_phase: 'Waxing Gibbous' });
  });

  test('rejects malformed dates', async () => {
    const result = await executeTool(
      'forecast_weather',
      { location: 'Lisbon', date: '11/01/2026' },
      contextFor(makeServices()),
    );
    expect(firstText(result)).toBe('Invalid input: date: Expected YYYY-MM-DD');
  });
});

describe('find_location', () => {
  test('describes the caller location', async () => {
    const services = makeServices({
      locationHttp: jsonReply({ city: 'Porto', region: 'Porto', country: 'PT' }),
    });
    const result = await executeTool('find_location', {}, contextFor(services));
    expect(firstText(result)).toBe('Current location: Porto, Porto, PT');
  });

  test('prefixes lookup failures', async () => {
    const services = makeServices({ locationHttp: jsonReply({}, 500) });
    const result = await executeTool('find_location', {}, contextFor(services));
    expect(firstText(result)).toBe('Error fetching location: Location lookup failed: 500');
  });
});
