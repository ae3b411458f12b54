/**
 * Fixed-capacity double-ended circular buffer
 *
 * @packageDocumentation
 */

export { CircularBuffer, MAX_CAPACITY } from './circular-buffer.mjs';
