import { Season } from "../schemas/userInput";

// Placeholder until a forecast provider is wired in: one line per season
const SEASONAL_WEATHER: Record<Season, string> = {
  Spring: "🌷 Mild weather with blooming flowers",
  Summer: "☀️ Warm and sunny, perfect for outdoor activities",
  Fall: "🍂 Comfortable temperatures with beautiful foliage",
  Winter: "❄️ Cooler temperatures, great for indoor attractions",
};

export function describeSeasonWeather(season: Season, destination: string): string {
  return `${season} in ${destination}: ${SEASONAL_WEATHER[season]}`;
}
