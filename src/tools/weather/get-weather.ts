import { z } from 'zod';
import type { WeatherReading, WeatherResult } from '../../types/tools.js';
import { createLogger } from '../../utils/logger.js';
import { wrapTool } from '../../utils/tool-wrapper.js';

const logger = createLogger('GetWeatherTool');

const GetWeatherSchema = z.object({
  city: z.string().describe('City name')
});

// Mock readings, matched on the exact city name.
const MOCK_WEATHER: Record<string, WeatherReading> = {
  'New York': { temperature: 22, condition: 'Sunny', humidity: 65 },
  'London': { temperature: 15, condition: 'Cloudy', humidity: 80 },
  'Tokyo': { temperature: 25, condition: 'Rainy', humidity: 75 },
  'Sydney': { temperature: 28, condition: 'Clear', humidity: 60 }
};

const DEFAULT_READING: WeatherReading = { temperature: 20, condition: 'Unknown', humidity: 50 };

export const getWeatherTool = wrapTool({
  name: 'weather.get_weather',
  description: 'Get weather information for a city',
  schema: GetWeatherSchema,
  handler: ({ city }): WeatherResult => {
    const reading = Object.prototype.hasOwnProperty.call(MOCK_WEATHER, city) ? MOCK_WEATHER[city] : undefined;

    if (reading) {
      return {
        city,
        weather: { ...reading },
        timestamp: new Date().toISOString(),
        source: 'mock_data'
      };
    }

    logger.info({ city }, 'City not in mock data, returning default reading');

    return {
      city,
      weather: { ...DEFAULT_READING },
      timestamp: new Date().toISOString(),
      source: 'mock_data',
      note: 'City not found, returning default data'
    };
  }
});
