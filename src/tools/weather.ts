import type { ToolSpec } from './types.js';

// Mock data; no weather API is called
const WEATHER_DB: Record<string, string> = {
  'new york': 'Sunny, 22°C (72°F), gentle breeze',
  london: 'Light rain, 15°C (59°F), cloudy skies',
  tokyo: 'Partly cloudy, 18°C (64°F), humid conditions',
  paris: 'Clear skies, 20°C (68°F), perfect weather',
  sydney: 'Sunny, 25°C (77°F), ideal beach weather',
  'san francisco': 'Foggy, 16°C (61°F), typical SF morning',
  berlin: 'Overcast, 12°C (54°F), cool and breezy',
  mumbai: 'Hot & humid, 32°C (90°F), monsoon season',
  singapore: 'Tropical, 28°C (82°F), afternoon storms',
};

export const KNOWN_CITIES = Object.keys(WEATHER_DB);

function titleCase(text: string): string {
  return text
    .toLowerCase()
    .split(/\s+/)
    .filter(Boolean)
    .map((word) => word[0].toUpperCase() + word.slice(1))
    .join(' ');
}

export function getWeather(city: string): string {
  const key = city.trim().toLowerCase();
  const displayName = titleCase(key);
  const weather = WEATHER_DB[key];
  if (!weather) {
    return `Weather info not available for ${displayName}`;
  }
  return `Weather in ${displayName}: ${weather}`;
}

export const weatherTool: ToolSpec = {
  name: 'weather',
  description: `Gets the current weather for a city. Known cities: ${KNOWN_CITIES.map(titleCase).join(', ')}.`,
  parameterName: 'city',
  defaultArgument: 'New York',
  handler: getWeather,
};
