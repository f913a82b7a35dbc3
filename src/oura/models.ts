import { z } from "zod";

// ============================================================================
// Shared building blocks
// ============================================================================

// Every record is strict: a field the schema does not declare fails decoding.
const record = <T extends z.ZodRawShape>(shape: T) => z.object(shape).strict();

const score = z.number().nullable();
const measure = z.number().nullish();
const text = z.string().nullish();
const dateString = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Must be YYYY-MM-DD format");

/** Time series sampled at a fixed interval (seconds). */
export const SampleSchema = record({
  interval: z.number(),
  items: z.array(z.number().nullable()),
  timestamp: z.string(),
});

/** Envelope shared by every collection endpoint. Items are decoded separately. */
export const CollectionEnvelopeSchema = record({
  data: z.array(z.unknown()),
  next_token: z.string().nullish(),
});

// ============================================================================
// Personal info and ring
// ============================================================================

export const PersonalInfoSchema = record({
  id: z.string(),
  age: z.number().int().nullish(),
  weight: measure,
  height: measure,
  biological_sex: text,
  email: text,
});

export const RingConfigurationSchema = record({
  id: z.string(),
  color: text,
  design: text,
  firmware_version: text,
  hardware_type: text,
  set_up_at: text,
  size: measure,
});

// ============================================================================
// Daily summaries
// ============================================================================

export const SleepContributorsSchema = record({
  deep_sleep: measure,
  efficiency: measure,
  latency: measure,
  rem_sleep: measure,
  restfulness: measure,
  timing: measure,
  total_sleep: measure,
});

export const DailySleepSchema = record({
  id: z.string(),
  day: dateString,
  score,
  timestamp: z.string(),
  contributors: SleepContributorsSchema,
});

export const ReadinessContributorsSchema = record({
  activity_balance: measure,
  body_temperature: measure,
  hrv_balance: measure,
  previous_day_activity: measure,
  previous_night: measure,
  recovery_index: measure,
  resting_heart_rate: measure,
  sleep_balance: measure,
  sleep_regularity: measure,
});

export const DailyReadinessSchema = record({
  id: z.string(),
  day: dateString,
  score,
  timestamp: z.string(),
  temperature_deviation: measure,
  temperature_trend_deviation: measure,
  contributors: ReadinessContributorsSchema,
});

export const ActivityContributorsSchema = record({
  meet_daily_targets: measure,
  move_every_hour: measure,
  recovery_time: measure,
  stay_active: measure,
  training_frequency: measure,
  training_volume: measure,
});

export const DailyActivitySchema = record({
  id: z.string(),
  day: dateString,
  score,
  timestamp: z.string(),
  class_5_min: text,
  active_calories: measure,
  average_met_minutes: measure,
  contributors: ActivityContributorsSchema,
  equivalent_walking_distance: measure,
  high_activity_met_minutes: measure,
  high_activity_time: measure,
  inactivity_alerts: measure,
  low_activity_met_minutes: measure,
  low_activity_time: measure,
  medium_activity_met_minutes: measure,
  medium_activity_time: measure,
  met: SampleSchema.nullish(),
  meters_to_target: measure,
  non_wear_time: measure,
  resting_time: measure,
  sedentary_met_minutes: measure,
  sedentary_time: measure,
  steps: measure,
  target_calories: measure,
  target_meters: measure,
  total_calories: measure,
});

export const DailyResilienceSchema = record({
  id: z.string(),
  day: dateString,
  level: z.enum(["limited", "adequate", "solid", "strong", "exceptional"]),
  contributors: record({
    sleep_recovery: z.number(),
    daytime_recovery: z.number(),
    stress: z.number(),
  }),
});

export const DailySpo2Schema = record({
  id: z.string(),
  day: dateString,
  spo2_percentage: record({ average: z.number() }).nullish(),
  breathing_disturbance_index: measure,
});

export const DailyStressSchema = record({
  id: z.string(),
  day: dateString,
  stress_high: measure,
  recovery_high: measure,
  day_summary: z.enum(["restored", "normal", "stressful"]).nullish(),
});

// ============================================================================
// Events, sessions and periods
// ============================================================================

export const EnhancedTagSchema = record({
  id: z.string(),
  tag_type_code: text,
  start_time: z.string(),
  end_time: text,
  start_day: dateString,
  end_day: text,
  comment: text,
  custom_name: text,
});

export const HeartRateSchema = record({
  bpm: z.number().int(),
  source: z.enum(["awake", "rest", "sleep", "session", "live", "workout"]),
  timestamp: z.string(),
});

export const RestModePeriodSchema = record({
  id: z.string(),
  start_day: dateString,
  start_time: text,
  end_day: text,
  end_time: text,
  episodes: z.array(
    record({
      tags: z.array(z.string()),
      timestamp: z.string(),
    })
  ),
});

export const SessionSchema = record({
  id: z.string(),
  day: dateString,
  start_datetime: z.string(),
  end_datetime: z.string(),
  type: z.enum(["breathing", "meditation", "nap", "relaxation", "rest", "body_status"]),
  heart_rate: SampleSchema.nullish(),
  heart_rate_variability: SampleSchema.nullish(),
  mood: z.enum(["bad", "worse", "same", "good", "great"]).nullish(),
  motion_count: SampleSchema.nullish(),
});

export const SleepSchema = record({
  id: z.string(),
  day: dateString,
  bedtime_start: z.string(),
  bedtime_end: z.string(),
  type: z.enum(["deleted", "sleep", "long_sleep", "late_nap", "rest"]),
  average_breath: measure,
  average_heart_rate: measure,
  average_hrv: measure,
  awake_time: measure,
  deep_sleep_duration: measure,
  efficiency: measure,
  heart_rate: SampleSchema.nullish(),
  hrv: SampleSchema.nullish(),
  latency: measure,
  light_sleep_duration: measure,
  low_battery_alert: z.boolean().nullish(),
  lowest_heart_rate: measure,
  movement_30_sec: text,
  period: measure,
  readiness: record({
    contributors: ReadinessContributorsSchema,
    score,
    temperature_deviation: measure,
    temperature_trend_deviation: measure,
  }).nullish(),
  readiness_score_delta: measure,
  rem_sleep_duration: measure,
  restless_periods: measure,
  sleep_algorithm_version: text,
  sleep_phase_5_min: text,
  sleep_score_delta: measure,
  time_in_bed: measure,
  total_sleep_duration: measure,
});

export const SleepTimeSchema = record({
  id: z.string(),
  day: dateString,
  optimal_bedtime: record({
    day_tz: z.number(),
    end_offset: z.number(),
    start_offset: z.number(),
  }).nullish(),
  recommendation: text,
  status: text,
});

export const VO2MaxSchema = record({
  id: z.string(),
  day: dateString,
  timestamp: z.string(),
  vo2_max: z.number().nullable(),
});

export const WorkoutSchema = record({
  id: z.string(),
  activity: z.string(),
  calories: measure,
  day: dateString,
  distance: measure,
  end_datetime: z.string(),
  intensity: z.enum(["easy", "moderate", "hard"]),
  label: text,
  source: z.string(),
  start_datetime: z.string(),
});

export type Sample = z.infer<typeof SampleSchema>;
export type PersonalInfo = z.infer<typeof PersonalInfoSchema>;
export type RingConfiguration = z.infer<typeof RingConfigurationSchema>;
export type DailySleep = z.infer<typeof DailySleepSchema>;
export type DailyReadiness = z.infer<typeof DailyReadinessSchema>;
export type DailyActivity = z.infer<typeof DailyActivitySchema>;
export type DailyResilience = z.infer<typeof DailyResilienceSchema>;
export type DailySpo2 = z.infer<typeof DailySpo2Schema>;
export type DailyStress = z.infer<typeof DailyStressSchema>;
export type EnhancedTag = z.infer<typeof EnhancedTagSchema>;
export type HeartRate = z.infer<typeof HeartRateSchema>;
export type RestModePeriod = z.infer<typeof RestModePeriodSchema>;
export type Session = z.infer<typeof SessionSchema>;
export type Sleep = z.infer<typeof SleepSchema>;
export type SleepTime = z.infer<typeof SleepTimeSchema>;
export type VO2Max = z.infer<typeof VO2MaxSchema>;
export type Workout = z.infer<typeof WorkoutSchema>;
