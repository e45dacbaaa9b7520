export type Role = "admin" | "staff";

export const APPLIANCE_KINDS = [
  "lights",
  "fans",
  "tvs",
  "ac",
  "fridge",
  "washing_machine",
] as const;

export type ApplianceKind = (typeof APPLIANCE_KINDS)[number];

export type ApplianceCounts = Record<ApplianceKind, number>;

/**
 * One user's consumption for one calendar day. Field names are the persisted
 * document's, so records can be written and read back without mapping.
 */
export type ConsumptionRecord = {
  username: string;
  date: string;
  day_of_week: string;
  appliances: ApplianceCounts;
  total_energy_kwh: number;
  estimated_cost: number;
};

export type UserProfile = {
  fullName: string;
  city: string;
  area: string;
  age: number;
  phone: string;
  occupation: string;
  householdSize: number;
};

export type UserAccount = {
  id: string;
  clerkUserId: string;
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  role?: Role;
  profile: UserProfile;
  createdAt?: Date;
};

export type NewUserAccount = Omit<UserAccount, "id" | "profile" | "createdAt">;

export type LoginEvent = {
  username: string;
  loginTime: Date;
  loginDate: string;
  sessionId: string;
  source: string;
};
