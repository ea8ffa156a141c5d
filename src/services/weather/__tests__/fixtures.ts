import type { CurrentWeatherResponse, ForecastDay } from '../../../types/weather.codecs.js';

export const currentWeather: CurrentWeatherResponse = {
  location: { name: 'Lisbon', region: 'Lisboa', country: 'Portugal' },
  current: {
    temp_c: 21.5,
    feelslike_c: 22,
    condition: { text: 'Sunny' },
    humidity: 40,
    wind_kph: 13.7,
    wind_dir: 'NW',
    gust_kph: 18.4,
    vis_km: 10,
    uv: 6,
    precip_mm: 0,
  },
};

export function forecastDay(date: string): ForecastDay {
  return {
    date,
    day: {
      condition: { text: 'Patchy rain nearby' },
      maxtemp_c: 18.2,
      mintemp_c: 11.4,
      avgtemp_c: 14.6,
      daily_chance_of_rain: 70,
      totalprecip_mm: 2.1,
      maxwind_kph: 24.5,
    },
    astro: { sunrise: '07:31 AM', sunset: '06:22 PM', moon_phase: 'Waxing Gibbous' },
    hour: Array.from({ length: 24 }, (_, h) => ({
      time: `${date} ${String(h).padStart(2, '0')}:00`,
      temp_c: 10 + h / 2,
      condition: { text: h < 12 ? 'Cloudy' : 'Light rain' },
      chance_of_rain: h * 2,
      wind_kph: 5 + h,
    })),
  };
}
