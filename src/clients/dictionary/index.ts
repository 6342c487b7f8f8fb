/**
 * Dictionary Client Module
 *
 * @module clients/dictionary
 */

export { FreeDictionaryClient, type FreeDictionaryClientOptions } from './client.js';
export {
  DictionaryApiResponseSchema,
  parseDictionaryResponse,
  type DictionaryApiResponse,
} from './parser.js';
