// Each backend registers itself with the process-wide registry on load.
import './matrix/adapter.js';
import './twitter/adapter.js';
import './twitter-browser/adapter.js';

export { platformRegistry } from '../core/platform-registry.js';
export { MatrixPlatform } from './matrix/adapter.js';
export { TwitterPlatform } from './twitter/adapter.js';
export { TwitterBrowserPlatform } from './twitter-browser/adapter.js';
