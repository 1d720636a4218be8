/**
 * Test Utilities Module
 *
 * In-process fakes for the seams the query pipeline depends on.
 *
 * @example
 * ```typescript
 * import { FakeGenerator, FakeRetriever } from '../../test-utils/index.js';
 *
 * const generator = new FakeGenerator(['safe', 'Deploy with make release.', 'safe']);
 * ```
 */

export {
  FakeGenerator,
  FakeRetriever,
  FakeEmbeddingProvider,
  makeChunk,
  textVector,
  type FakeReply,
} from './fakes.js';
