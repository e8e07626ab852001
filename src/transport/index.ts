/**
 * Stream Transport
 *
 * Text channels to the remote prompt service.
 */

export {
  BaseChannel,
  type Channel,
  type ChannelFactory,
  type OpenChannelOptions,
} from './channel';

export { TelnetChannel, TelnetDecoder, openTelnetChannel, type DecodedChunk } from './telnet';

export {
  ReplayChannel,
  createReplayFactory,
  loadReplayScript,
  parseReplayScript,
  type ReplayScript,
} from './replay';
