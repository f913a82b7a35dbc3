import {
  DailyActivitySchema,
  DailyReadinessSchema,
  DailyResilienceSchema,
  DailySleepSchema,
  DailySpo2Schema,
  DailyStressSchema,
  EnhancedTagSchema,
  HeartRateSchema,
  RestModePeriodSchema,
  RingConfigurationSchema,
  SessionSchema,
  SleepSchema,
  SleepTimeSchema,
  VO2MaxSchema,
  WorkoutSchema,
} from "./models.js";
import type { DatumSchema, SummaryResource } from "./types.js";

export function defineSummaryResource<T>(name: string, datum: DatumSchema<T>): SummaryResource<T> {
  return { name, datum };
}

/** Every `usercollection` resource reachable through `OuraClient.fetchSummary`. */
export const summaryResources = {
  dailySleep: defineSummaryResource("daily_sleep", DailySleepSchema),
  dailyReadiness: defineSummaryResource("daily_readiness", DailyReadinessSchema),
  dailyActivity: defineSummaryResource("daily_activity", DailyActivitySchema),
  dailyResilience: defineSummaryResource("daily_resilience", DailyResilienceSchema),
  dailySpo2: defineSummaryResource("daily_spo2", DailySpo2Schema),
  dailyStress: defineSummaryResource("daily_stress", DailyStressSchema),
  enhancedTag: defineSummaryResource("enhanced_tag", EnhancedTagSchema),
  heartRate: defineSummaryResource("heartrate", HeartRateSchema),
  restModePeriod: defineSummaryResource("rest_mode_period", RestModePeriodSchema),
  ringConfiguration: defineSummaryResource("ring_configuration", RingConfigurationSchema),
  session: defineSummaryResource("session", SessionSchema),
  sleep: defineSummaryResource("sleep", SleepSchema),
  sleepTime: defineSummaryResource("sleep_time", SleepTimeSchema),
  vo2Max: defineSummaryResource("vO2_max", VO2MaxSchema),
  workout: defineSummaryResource("workout", WorkoutSchema),
} as const;

export type SummaryResourceKey = keyof typeof summaryResources;
