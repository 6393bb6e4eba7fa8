/**
 * @transport - Fire-and-forget UDP delivery of encoded frames
 */

export {
  DatagramDispatcher,
  type DatagramSocket,
  type DatagramDispatcherOptions,
  type DispatcherStats,
} from './dispatcher';
