export { TaggingModule } from './TaggingModule.js';
export type { ITaggingModuleDependencies } from './TaggingModule.js';
export { MentionResponder, NO_TAGS_MESSAGE, TAG_FAILED_MESSAGE } from './mention-responder.js';
export type { MentionOutcome, IBotIdentity, IMentionResponderOptions } from './mention-responder.js';
export { CommandHandler, GREETING_MESSAGE } from './command-handlers.js';
export { MAX_TAG_MESSAGE_LENGTH, buildMemberTags, buildAdminTags, chunkTags } from './tag-list.js';
