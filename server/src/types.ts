export const USER_ROLES = ['admin', 'coach', 'swimmer', 'fan'] as const;
export type UserRole = (typeof USER_ROLES)[number];

export const GENDERS = ['M', 'F'] as const;
export type Gender = (typeof GENDERS)[number];

export const STROKES = ['freestyle', 'backstroke', 'breaststroke', 'butterfly', 'im'] as const;
export type Stroke = (typeof STROKES)[number];

export const COURSES = ['scy', 'scm', 'lcm'] as const;
export type Course = (typeof COURSES)[number];

export const TEAM_TYPES = ['club', 'high_school', 'college', 'national', 'olympic'] as const;
export type TeamType = (typeof TEAM_TYPES)[number];

export const MEET_TYPES = ['championship', 'invitational', 'dual', 'time_trial'] as const;
export type MeetType = (typeof MEET_TYPES)[number];

export const ROUNDS = ['prelims', 'finals', 'consolation', 'bonus_finals', 'time_trial'] as const;
export type Round = (typeof ROUNDS)[number];

export const INVITATION_STATUSES = ['pending', 'accepted', 'expired', 'revoked'] as const;
export type InvitationStatus = (typeof INVITATION_STATUSES)[number];

export const FOLLOW_STATUSES = ['pending', 'approved', 'denied'] as const;
export type FollowStatus = (typeof FOLLOW_STATUSES)[number];

export const SUIT_TYPES = ['jammer', 'kneeskin', 'brief'] as const;
export type SuitType = (typeof SUIT_TYPES)[number];

export const SUIT_CONDITIONS = ['new', 'good', 'worn', 'retired'] as const;
export type SuitCondition = (typeof SUIT_CONDITIONS)[number];

export interface UserRow {
  id: string;
  email: string;
  password_hash: string;
  display_name: string | null;
  role: UserRole;
  swimmer_id: string | null;
  active: boolean;
  last_login_at?: string | null;
  created_at?: string;
}

export interface UserSessionRow {
  id: string;
  user_id: string;
  role: UserRole;
  refresh_token_hash: string;
  expires_at: string;
  revoked_at: string | null;
  device_info?: string | null;
  created_ip?: string | null;
}

export interface InvitationRow {
  id: string;
  inviter_id: string;
  email: string;
  role: UserRole;
  token: string;
  status: InvitationStatus;
  expires_at: string;
  accepted_by: string | null;
  accepted_at: string | null;
  team_id: string | null;
  created_at?: string;
}

export interface FanFollowRow {
  id: string;
  fan_id: string;
  swimmer_id: string;
  initiated_by: string;
  status: FollowStatus;
  created_at?: string;
  responded_at: string | null;
}

export interface TeamRow {
  id: string;
  name: string;
  team_type: TeamType;
  sanctioning_body: string;
  lsc: string | null;
  division: string | null;
  state: string | null;
  country: string | null;
}

export interface SwimmerRow {
  id: string;
  first_name: string;
  last_name: string;
  date_of_birth: string;
  gender: Gender;
  user_id: string | null;
  usa_swimming_id: string | null;
  swimcloud_url: string | null;
}

export interface SwimmerTeamRow {
  id: string;
  swimmer_id: string;
  team_id: string;
  start_date: string;
  end_date: string | null;
}

export interface EventRow {
  id: string;
  stroke: Stroke;
  distance: number;
  course: Course;
}

export interface MeetRow {
  id: string;
  name: string;
  location: string;
  city: string;
  state: string | null;
  country: string;
  start_date: string;
  end_date: string | null;
  course: Course;
  lanes: number;
  indoor: boolean;
  sanctioning_body: string;
  meet_type: MeetType;
}

export interface MeetTeamRow {
  id: string;
  meet_id: string;
  team_id: string;
  is_host: boolean;
}

export interface TimeStandardRow {
  id: string;
  event_id: string;
  gender: Gender;
  age_group: string | null;
  standard_name: string;
  cut_level: string;
  sanctioning_body: string;
  time_centiseconds: number;
  qualifying_start: string | null;
  qualifying_end: string | null;
  effective_year: number;
}

export interface SwimTimeRow {
  id: string;
  swimmer_id: string;
  event_id: string;
  meet_id: string;
  team_id: string;
  time_centiseconds: number;
  swim_date: string;
  round: Round | null;
  lane: number | null;
  place: number | null;
  official: boolean;
  dq: boolean;
  dq_reason: string | null;
  suit_id: string | null;
}

export interface SplitRow {
  id: string;
  swim_time_id: string;
  distance: number;
  time_centiseconds: number;
}

export interface SuitModelRow {
  id: string;
  brand: string;
  model_name: string;
  suit_type: SuitType;
  is_tech_suit: boolean;
  gender: Gender;
  release_year: number | null;
  msrp_cents: number | null;
  expected_races_peak: number;
  expected_races_total: number;
  fina_approved: boolean;
  notes: string | null;
}

export interface SwimmerSuitRow {
  id: string;
  swimmer_id: string;
  suit_model_id: string;
  nickname: string | null;
  size: string | null;
  color: string | null;
  purchase_date: string | null;
  purchase_price_cents: number | null;
  purchase_location: string | null;
  wear_count: number;
  race_count: number;
  condition: SuitCondition;
  retired_date: string | null;
  retirement_reason: string | null;
}

export interface AuthContext {
  userId: string;
  role: UserRole;
  sessionId: string;
}

declare module 'express-serve-static-core' {
  interface Request {
    auth?: AuthContext;
  }
}
