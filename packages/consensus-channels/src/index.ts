/**
 * @consensus-harness/channels
 *
 * Bounded, closable FIFO channels connecting the consensus worker to its collaborators.
 */

export {
  ChannelClosedError,
  makeChannel,
  type Channel,
  type Sender,
  type Receiver,
} from './lib/channel';
