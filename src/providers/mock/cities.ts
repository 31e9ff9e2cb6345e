/**
 * Built-in data for the mock provider.
 *
 * @module providers/mock/cities
 */

export interface MockCity {
  name: string;
  country: string;
  latitude: number;
  longitude: number;
}

export const MOCK_CITIES: readonly MockCity[] = [
  { name: 'Berlin', country: 'Germany', latitude: 52.52, longitude: 13.405 },
  { name: 'Munich', country: 'Germany', latitude: 48.1351, longitude: 11.582 },
  { name: 'Hamburg', country: 'Germany', latitude: 53.5511, longitude: 9.9937 },
  { name: 'Cologne', country: 'Germany', latitude: 50.9375, longitude: 6.9603 },
  { name: 'Frankfurt', country: 'Germany', latitude: 50.1109, longitude: 8.6821 },
  { name: 'New York', country: 'United States', latitude: 40.7128, longitude: -74.006 },
  { name: 'Los Angeles', country: 'United States', latitude: 34.0522, longitude: -118.2437 },
  { name: 'Chicago', country: 'United States', latitude: 41.8781, longitude: -87.6298 },
  { name: 'San Francisco', country: 'United States', latitude: 37.7749, longitude: -122.4194 },
  { name: 'London', country: 'United Kingdom', latitude: 51.5074, longitude: -0.1278 },
  { name: 'Manchester', country: 'United Kingdom', latitude: 53.4808, longitude: -2.2426 },
  { name: 'Birmingham', country: 'United Kingdom', latitude: 52.4862, longitude: -1.8904 },
  { name: 'Paris', country: 'France', latitude: 48.8566, longitude: 2.3522 },
  { name: 'Lyon', country: 'France', latitude: 45.764, longitude: 4.8357 },
  { name: 'Marseille', country: 'France', latitude: 43.2965, longitude: 5.3698 },
  // Deliberate duplicates for exercising deduplication
  { name: 'Berlin', country: 'Germany', latitude: 52.5201, longitude: 13.4051 },
  { name: 'London', country: 'United Kingdom', latitude: 51.5074, longitude: -0.1278 },
  { name: 'Paris', country: 'France', latitude: 48.8566, longitude: 2.3522 },
];

/**
 * Records appended when the query mentions "test": exact, near and far
 * copies of one place.
 */
export const TEST_CITY_VARIANTS: readonly MockCity[] = [
  { name: 'Test City', country: 'Test Country', latitude: 50.0, longitude: 10.0 },
  { name: 'Test City', country: 'Test Country', latitude: 50.0001, longitude: 10.0001 },
  { name: 'Test City', country: 'Test Country', latitude: 50.0, longitude: 10.0 },
  { name: 'Test City', country: 'Test Country', latitude: 50.1, longitude: 10.1 },
];
