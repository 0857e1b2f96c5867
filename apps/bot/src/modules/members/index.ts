export { JsonFileMemberStore } from './member-store.js';
export { MembershipTracker, isGroupChat } from './membership-tracker.js';
export { addMember, getMembers } from './member-registry.js';
