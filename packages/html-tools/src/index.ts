export { createHtmlCapability } from './capability.js';
export {
  createHtmlCleaner,
  DEFAULT_REMOVED_TAGS,
  PRESERVED_DATA_ATTRIBUTES,
  type HtmlCleanerOptions
} from './cleaner.js';
