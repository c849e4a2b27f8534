import { PredictionRecord } from "../schema/predictionRecord";

// ============================================================================
// CATEGORICAL CHOICES (as offered by interactive input)
// ============================================================================

export type Occupation = "Professional" | "Unemployed" | "Student";
export type FirstInteraction = "Website" | "Mobile App";
export type ProfileCompletion = "Low" | "Medium" | "High";
export type LastActivity = "Email" | "Phone" | "Website";
export type MediaChannel =
  | "Print Media Type 1"
  | "Print Media Type 2"
  | "Digital Media Ads"
  | "Educational Channels";

export interface LeadProfile {
  age: number;
  websiteVisits: number;
  /** Seconds */
  timeSpentOnWebsite: number;
  pageViewsPerVisit: number;
  occupation: Occupation;
  firstInteraction: FirstInteraction;
  profileCompletion: ProfileCompletion;
  lastActivity: LastActivity;
  referred: boolean;
  mediaChannels: readonly MediaChannel[];
}

/**
 * One-hot encode a profile into the record the model expects.
 * Professional, High and Email are the implicit categories: all related flags false.
 */
export function encodeLeadProfile(profile: LeadProfile): PredictionRecord {
  const seen = (channel: MediaChannel) => profile.mediaChannels.includes(channel);

  return {
    age: profile.age,
    website_visits: profile.websiteVisits,
    time_spent_on_website: profile.timeSpentOnWebsite,
    page_views_per_visit: profile.pageViewsPerVisit,
    current_occupation_student: profile.occupation === "Student",
    current_occupation_unemployed: profile.occupation === "Unemployed",
    first_interaction_website: profile.firstInteraction === "Website",
    profile_completed_low: profile.profileCompletion === "Low",
    profile_completed_medium: profile.profileCompletion === "Medium",
    last_activity_phone: profile.lastActivity === "Phone",
    last_activity_website: profile.lastActivity === "Website",
    print_media_type1_yes: seen("Print Media Type 1"),
    print_media_type2_yes: seen("Print Media Type 2"),
    digital_media_yes: seen("Digital Media Ads"),
    educational_channels_yes: seen("Educational Channels"),
    referral_yes: profile.referred,
  };
}
