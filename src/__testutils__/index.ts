/**
 * Test utilities - Re-export all test helpers
 *
 * ```ts
 * import { RecordingSession, captureLogs, openRawConnection } from '@/__testutils__/index.js';
 * ```
 */

export { assertEventually, delay } from './assertions.js';
export { RecordingSession, type Behavior, type Invocation } from './RecordingSession.js';
export { captureLogs, type LogCapture } from './logCapture.js';
export { createDropFilter, seededRandom } from './lossyLink.js';
export { openRawConnection, type RawConnection } from './rawConnection.js';
