/**
 * Event tracking
 *
 * Persistence of mentions awaiting a reply, and the rules that turn a
 * query result into an event or a reply.
 */

export { EventStore, type EventForm, type TrackedEvent } from './events';

export {
  MAX_REPLY_LENGTH,
  NOT_FOUND_REPLY,
  buildEvent,
  computeDeadline,
  formatCandidatesReply,
  mentionBody,
  parseLightTimeMinutes,
  type Mention,
  type MentionOutcome,
} from './mentions';
