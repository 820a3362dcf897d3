/**
 * MIME header parsing
 *
 * @packageDocumentation
 */

export {
  headerBlock,
  headerValues,
  parseHeaders,
  unfoldHeaders,
  type Headers
} from './header-parser.js';
