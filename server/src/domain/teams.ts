import { ValidationError } from '../utils/errors.js';
import type { SwimmerTeamRow, TeamRow, TeamType } from '../types.js';
import { todayIsoDate } from './swimmers.js';

type TeamFields = Pick<TeamRow, 'team_type' | 'lsc' | 'division' | 'state' | 'country'>;

const REQUIRED_FIELD: Record<TeamType, { field: keyof Omit<TeamFields, 'team_type'>; label: string }> = {
  club: { field: 'lsc', label: 'LSC' },
  college: { field: 'division', label: 'division' },
  high_school: { field: 'state', label: 'state' },
  national: { field: 'country', label: 'country' },
  olympic: { field: 'country', label: 'country' },
};

export class TeamValidationError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = 'TeamValidationError';
  }
}

export function validateTeamFields(team: TeamFields) {
  const requirement = REQUIRED_FIELD[team.team_type];
  const value = team[requirement.field];
  if (!value || !value.trim()) {
    const article = team.team_type === 'olympic' ? 'an' : 'a';
    throw new TeamValidationError(
      `${requirement.label} is required for ${article} ${team.team_type.replace('_', ' ')} team`,
    );
  }
}

export function isCurrentMembership(membership: Pick<SwimmerTeamRow, 'end_date'>, today = todayIsoDate()) {
  return membership.end_date === null || membership.end_date >= today;
}
