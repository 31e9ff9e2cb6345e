/**
 * Mock Provider Exports
 *
 * @module providers/mock
 */

export {
  MockProvider,
  MOCK_INFO,
  MOCK_DEFAULTS,
  createMockCities,
  type MockProviderOptions,
} from './provider.js';

export { MOCK_CITIES, TEST_CITY_VARIANTS, type MockCity } from './cities.js';
