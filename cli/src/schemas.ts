import { z } from 'zod';

export const USER_ROLES = ['admin', 'coach', 'swimmer', 'fan'] as const;
export type UserRole = (typeof USER_ROLES)[number];

export const errorBodySchema = z.object({ error: z.string() });

export const userSchema = z.object({
  id: z.string(),
  email: z.string(),
  displayName: z.string().nullable(),
  role: z.enum(USER_ROLES),
  swimmerId: z.string().nullable(),
  active: z.boolean(),
});

export const sessionSchema = z.object({
  accessToken: z.string(),
  refreshToken: z.string(),
  expiresIn: z.number(),
  refreshExpiresIn: z.number(),
  user: userSchema,
});

export type Session = z.infer<typeof sessionSchema>;

export const teamSchema = z.object({
  id: z.string(),
  name: z.string(),
  team_type: z.string(),
  sanctioning_body: z.string(),
  lsc: z.string().nullable(),
  division: z.string().nullable(),
  state: z.string().nullable(),
  country: z.string().nullable(),
});

export const swimmerSchema = z.object({
  id: z.string(),
  first_name: z.string(),
  last_name: z.string(),
  full_name: z.string(),
  date_of_birth: z.string(),
  gender: z.string(),
  age: z.number(),
  age_group: z.string(),
  usa_swimming_id: z.string().nullable(),
});

export const membershipSchema = z.object({
  id: z.string(),
  team_id: z.string(),
  team_name: z.string().nullable(),
  start_date: z.string(),
  end_date: z.string().nullable(),
  is_current: z.boolean(),
});

export const eventSchema = z.object({
  id: z.string(),
  stroke: z.string(),
  distance: z.number(),
  course: z.string(),
  label: z.string(),
});

export const meetSchema = z.object({
  id: z.string(),
  name: z.string(),
  city: z.string(),
  state: z.string().nullable(),
  start_date: z.string(),
  end_date: z.string().nullable(),
  course: z.string(),
  meet_type: z.string(),
  sanctioning_body: z.string(),
  lanes: z.number(),
  indoor: z.boolean(),
});

export const meetTeamSchema = z.object({
  id: z.string(),
  team_id: z.string(),
  team_name: z.string().nullable(),
  is_host: z.boolean(),
});

export const swimTimeSchema = z.object({
  id: z.string(),
  swimmer_id: z.string(),
  event_id: z.string(),
  meet_id: z.string(),
  time_centiseconds: z.number(),
  time_formatted: z.string(),
  swim_date: z.string(),
  round: z.string().nullable(),
  official: z.boolean(),
  dq: z.boolean(),
});

export const detailedSwimTimeSchema = swimTimeSchema.extend({
  splits: z.array(
    z.object({
      distance: z.number(),
      time_formatted: z.string(),
      interval_formatted: z.string(),
    }),
  ),
});

export const personalBestSchema = swimTimeSchema.extend({
  event: eventSchema.nullable(),
});

export const analysisSchema = z.object({
  swim_time: swimTimeSchema,
  personal_best: swimTimeSchema.nullable(),
  is_personal_best: z.boolean(),
  time_off_pb: z.number().nullable(),
  improvement_percentage: z.number().nullable(),
});

export const standardSchema = z.object({
  id: z.string(),
  gender: z.string(),
  age_group: z.string().nullable(),
  standard_name: z.string(),
  cut_level: z.string(),
  sanctioning_body: z.string(),
  time_formatted: z.string(),
  effective_year: z.number(),
  event: eventSchema.nullable(),
});

const standardResultSchema = z.object({
  standard: z.object({
    standard_name: z.string(),
    cut_level: z.string(),
    sanctioning_body: z.string(),
    age_group: z.string().nullable(),
  }),
  time_formatted: z.string(),
  achieved: z.boolean(),
  margin_seconds: z.number(),
});

export const qualificationSchema = z.object({
  time_formatted: z.string(),
  valid: z.boolean(),
  age: z.number(),
  event: eventSchema,
  standards: z.array(standardResultSchema),
  best_achieved: standardResultSchema.nullable(),
  next_standard: standardResultSchema.nullable(),
});

export type Qualification = z.infer<typeof qualificationSchema>;

export const swimStandardsSchema = qualificationSchema.extend({
  split_standards: z.array(
    z.object({
      distance: z.number(),
      time_formatted: z.string(),
      event: eventSchema,
      achieved: z.array(standardResultSchema.pick({ standard: true, time_formatted: true })),
    }),
  ),
});

export const swimmerQualificationsSchema = z.object({
  swimmer: swimmerSchema,
  as_of: z.string(),
  age: z.number(),
  groups: z.array(
    z.object({
      equivalence_key: z.string(),
      rows: z.array(
        z.object({
          event: z.object({ label: z.string() }),
          standard: z.object({ standard_name: z.string(), cut_level: z.string() }),
          cut_formatted: z.string(),
          best_time: z.object({ time_formatted: z.string(), swim_date: z.string() }).nullable(),
          achieved: z.boolean(),
          margin_seconds: z.number().nullable(),
        }),
      ),
    }),
  ),
});

export const invitationSchema = z.object({
  id: z.string(),
  email: z.string(),
  role: z.enum(USER_ROLES),
  token: z.string(),
  status: z.string(),
  expires_at: z.string(),
});

export const followSchema = z.object({
  id: z.string(),
  fan_id: z.string(),
  swimmer_id: z.string(),
  initiated_by: z.string(),
  status: z.string(),
});

export const suitModelSchema = z.object({
  id: z.string(),
  brand: z.string(),
  model_name: z.string(),
  suit_type: z.string(),
  gender: z.string(),
  is_tech_suit: z.boolean(),
  msrp_formatted: z.string().nullable(),
  expected_races_total: z.number(),
});

export const swimmerSuitSchema = z.object({
  id: z.string(),
  swimmer_id: z.string(),
  nickname: z.string().nullable(),
  size: z.string().nullable(),
  condition: z.string(),
  race_count: z.number(),
  is_current: z.boolean(),
  remaining_races: z.number().nullable(),
  suit_model: z.object({ brand: z.string(), model_name: z.string() }).nullable(),
});

export const messageSchema = z.object({ message: z.string() });
export const successSchema = z.object({ success: z.boolean() });
