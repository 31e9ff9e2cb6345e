/**
 * Search Module Exports
 *
 * @module search
 */

export {
  CitySearchController,
  type CitySearchControllerOptions,
  type ControllerEvent,
  type ControllerListener,
  type UrlOpener,
} from './controller.js';

export { buildMapUrl, DEFAULT_MAP_ZOOM } from './map-url.js';

export {
  openInBrowser,
  openerCommand,
  type OpenerCommand,
  type OpenInBrowserOptions,
  type SpawnFn,
} from './browser.js';
