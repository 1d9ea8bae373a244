import type { FanFollowRow, UserRole } from '../types.js';

const INVITABLE_ROLES: Record<UserRole, readonly UserRole[]> = {
  admin: ['admin', 'coach', 'swimmer', 'fan'],
  coach: ['swimmer', 'fan'],
  swimmer: ['fan'],
  fan: [],
};

export function canInviteRole(inviter: UserRole, role: UserRole) {
  return INVITABLE_ROLES[inviter].includes(role);
}

export function invitableRoles(inviter: UserRole) {
  return INVITABLE_ROLES[inviter];
}

export function isFollowRequest(follow: Pick<FanFollowRow, 'initiated_by' | 'fan_id'>) {
  return follow.initiated_by === follow.fan_id;
}

/** Requests are answered by the swimmer, invites by the fan. */
export function followResponder(follow: Pick<FanFollowRow, 'initiated_by' | 'fan_id' | 'swimmer_id'>) {
  return isFollowRequest(follow) ? follow.swimmer_id : follow.fan_id;
}

export function canRemoveFollow(follow: Pick<FanFollowRow, 'fan_id' | 'swimmer_id'>, userId: string, role: UserRole) {
  return role === 'admin' || follow.fan_id === userId || follow.swimmer_id === userId;
}
