/**
 * City Search Controller Tests
 *
 * Covers the search lifecycle, error reporting, supersession and
 * cancellation, provider switching and map links.
 */

import { describe, it, expect, jest, beforeEach } from '@jest/globals';
import { CitySearchController, type ControllerEvent, type UrlOpener } from './controller.js';
import { MockProvider } from '../providers/mock/provider.js';
import { ProviderRegistry } from '../providers/registry.js';
import type { Logger } from '../logging/index.js';

// ============================================================================
// Mock Helpers
// ============================================================================

function createMockLogger(): Logger {
  return {
    debug: jest.fn<Logger['debug']>(),
    info: jest.fn<Logger['info']>(),
    warn: jest.fn<Logger['warn']>(),
    error: jest.fn<Logger['error']>(),
  };
}

function createInstantProvider(): MockProvider {
  return new MockProvider({ simulateDelay: false });
}

/**
 * Controller plus a log of every event it emits
 */
function createController(provider: MockProvider = createInstantProvider()): {
  controller: CitySearchController;
  events: ControllerEvent[];
} {
  const controller = new CitySearchController({ provider });
  const events: ControllerEvent[] = [];
  controller.subscribe((event) => events.push(event));
  return { controller, events };
}

// ============================================================================
// search
// ============================================================================

describe('CitySearchController.search', () => {
  it('should fill the collection with deduplicated results', async () => {
    const { controller, events } = createController();

    const count = await controller.search('Germany');

    expect(count).toBe(6);
    expect(controller.results.count()).toBe(5);
    expect(controller.errorMessage).toBe('');
    expect(controller.isSearching).toBe(false);
    expect(controller.successfulRequests).toBe(1);
    expect(events).toEqual([
      { type: 'searchStarted', query: 'Germany' },
      { type: 'searchCompleted', count: 6 },
      { type: 'searchFinished' },
    ]);
  });

  it('should report provider failures through errorMessage', async () => {
    const provider = new MockProvider({
      simulateDelay: false,
      simulateErrors: true,
      errorRate: 1,
      random: () => 0,
    });
    const { controller, events } = createController(provider);

    const count = await controller.search('Berlin');

    expect(count).toBe(0);
    expect(controller.errorMessage).toBe('Simulated network error for query: Berlin');
    expect(controller.errorCode).toBe('SIMULATED');
    expect(controller.failedRequests).toBe(1);
    expect(events).toEqual([
      { type: 'searchStarted', query: 'Berlin' },
      { type: 'searchFailed', message: 'Simulated network error for query: Berlin' },
      { type: 'searchFinished' },
    ]);
  });

  it('should report a blank query', async () => {
    const { controller } = createController();

    await controller.search('   ');

    expect(controller.errorMessage).toBe('Please enter a search query');
    expect(controller.errorCode).toBe('EMPTY_QUERY');
    expect(controller.results.count()).toBe(0);
  });

  it('should clear previous results and errors when a new search starts', async () => {
    const { controller } = createController();
    await controller.search('   ');
    await controller.search('Germany');

    expect(controller.errorMessage).toBe('');
    expect(controller.results.count()).toBe(5);

    await controller.search('   ');
    expect(controller.results.count()).toBe(0);
  });

  it('should be busy while the provider works', async () => {
    const { controller } = createController(new MockProvider({ delayMs: 10 }));

    const pending = controller.search('Lyon');
    expect(controller.isSearching).toBe(true);

    await expect(pending).resolves.toBe(1);
    expect(controller.isSearching).toBe(false);
  });

  it('should drop the results of a superseded search', async () => {
    const provider = new MockProvider({ delayMs: 10_000 });
    const { controller, events } = createController(provider);

    const first = controller.search('Lyon');
    provider.setSimulateNetworkDelay(false);
    const second = controller.search('Paris');

    await expect(first).resolves.toBe(0);
    await expect(second).resolves.toBe(2);
    expect(controller.results.toArray().map((place) => place.name)).toEqual(['Paris']);
    expect(controller.errorMessage).toBe('');
    expect(events).toEqual([
      { type: 'searchStarted', query: 'Lyon' },
      { type: 'searchStarted', query: 'Paris' },
      { type: 'searchCompleted', count: 2 },
      { type: 'searchFinished' },
    ]);
  });
});

// ============================================================================
// clearResults
// ============================================================================

describe('CitySearchController.clearResults', () => {
  it('should empty results and the error message', async () => {
    const openUrl = jest.fn<UrlOpener>().mockResolvedValue(false);
    const controller = new CitySearchController({ provider: createInstantProvider(), openUrl });
    await controller.search('Germany');
    await controller.openPlaceInBrowser(52.52, 13.405);
    expect(controller.errorMessage).toBe('Failed to open location in browser');

    controller.clearResults();

    expect(controller.results.count()).toBe(0);
    expect(controller.errorMessage).toBe('');
  });

  it('should cancel a search in flight', async () => {
    const provider = new MockProvider({ delayMs: 10_000 });
    const { controller, events } = createController(provider);

    const pending = controller.search('Lyon');
    controller.clearResults();

    expect(controller.isSearching).toBe(false);
    await expect(pending).resolves.toBe(0);
    expect(controller.errorMessage).toBe('');
    expect(provider.isSearching()).toBe(false);
    expect(events).toEqual([{ type: 'searchStarted', query: 'Lyon' }, { type: 'searchFinished' }]);
  });
});

// ============================================================================
// Provider switching
// ============================================================================

describe('CitySearchController provider switching', () => {
  let registry: ProviderRegistry;

  beforeEach(() => {
    registry = new ProviderRegistry();
    registry.register(createInstantProvider());
  });

  it('should expose the current provider', () => {
    const { controller } = createController();

    expect(controller.currentProviderName).toBe('Mock');
    expect(controller.providerDescription).toBe(
      'Mock service for testing - returns predefined test data with configurable delays and errors'
    );
  });

  it('should announce a provider change', () => {
    const { controller, events } = createController();
    const replacement = createInstantProvider();

    controller.setProvider(replacement);

    expect(controller.getProvider()).toBe(replacement);
    expect(events).toEqual([{ type: 'providerChanged', name: 'Mock' }]);
  });

  it('should switch by name through a registry', () => {
    const { controller } = createController();

    expect(controller.setProviderType('MOCK', registry)).toBe(true);
    expect(controller.getProvider()).toBe(registry.get('mock'));
    expect(controller.errorMessage).toBe('');
  });

  it('should reject unknown provider names', () => {
    const { controller } = createController();
    const before = controller.getProvider();

    expect(controller.setProviderType('bing', registry)).toBe(false);
    expect(controller.errorMessage).toBe("Provider 'bing' is not available");
    expect(controller.getProvider()).toBe(before);
  });

  it('should report a provider the registry cannot supply', () => {
    const { controller } = createController();

    expect(controller.setProviderType('nominatim', registry)).toBe(false);
    expect(controller.errorMessage).toBe("Failed to create provider 'Nominatim'");
  });
});

// ============================================================================
// openPlaceInBrowser
// ============================================================================

describe('CitySearchController.openPlaceInBrowser', () => {
  it('should open an OpenStreetMap view at zoom 15', async () => {
    const openUrl = jest.fn<UrlOpener>().mockResolvedValue(true);
    const controller = new CitySearchController({ provider: createInstantProvider(), openUrl });

    await expect(controller.openPlaceInBrowser(52.52, 13.405, 'Berlin')).resolves.toBe(true);

    expect(openUrl).toHaveBeenCalledWith('https://www.openstreetmap.org/#map=15/52.520000/13.405000');
    expect(controller.errorMessage).toBe('');
  });

  it('should use the configured zoom', async () => {
    const openUrl = jest.fn<UrlOpener>().mockResolvedValue(true);
    const controller = new CitySearchController({ provider: createInstantProvider(), openUrl, mapZoom: 10 });

    await controller.openPlaceInBrowser(-33.8688, 151.2093);

    expect(openUrl).toHaveBeenCalledWith('https://www.openstreetmap.org/#map=10/-33.868800/151.209300');
  });

  it('should set an error when the browser cannot be opened', async () => {
    const openUrl = jest.fn<UrlOpener>().mockResolvedValue(false);
    const controller = new CitySearchController({ provider: createInstantProvider(), openUrl });

    await expect(controller.openPlaceInBrowser(0, 0)).resolves.toBe(false);

    expect(controller.errorMessage).toBe('Failed to open location in browser');
  });
});

// ============================================================================
// Observers
// ============================================================================

describe('CitySearchController observers', () => {
  it('should stop notifying after unsubscribe', async () => {
    const controller = new CitySearchController({ provider: createInstantProvider() });
    const listener = jest.fn<(event: ControllerEvent) => void>();
    const unsubscribe = controller.subscribe(listener);

    unsubscribe();
    await controller.search('Lyon');

    expect(listener).not.toHaveBeenCalled();
  });

  it('should log a throwing listener and keep going', async () => {
    const logger = createMockLogger();
    const controller = new CitySearchController({ provider: createInstantProvider(), logger });
    controller.subscribe(() => {
      throw new Error('view gone');
    });

    await expect(controller.search('Lyon')).resolves.toBe(1);

    expect(controller.results.count()).toBe(1);
    expect(logger.error).toHaveBeenCalledWith('[controller] Event listener failed: view gone');
  });
});
