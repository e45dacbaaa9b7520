import {
  LoginEvent,
  NewUserAccount,
  Role,
  UserAccount,
  UserProfile,
} from "../domain/types";

/** Fields left undefined are kept; a `null` role removes the stored one. */
export type IdentityUpdate = {
  email?: string;
  firstName?: string;
  lastName?: string;
  role?: Role | null;
};

export type ProfileUpdate = {
  email?: string;
  profile: Partial<UserProfile>;
};

export interface UserDirectory {
  findByClerkUserId(clerkUserId: string): Promise<UserAccount | null>;
  findByUsername(username: string): Promise<UserAccount | null>;
  listAll(): Promise<UserAccount[]>;
  create(user: NewUserAccount): Promise<UserAccount>;
  updateIdentity(clerkUserId: string, update: IdentityUpdate): Promise<UserAccount | null>;
  updateProfile(clerkUserId: string, update: ProfileUpdate): Promise<UserAccount | null>;
  deleteByClerkUserId(clerkUserId: string): Promise<boolean>;
  recordLogin(event: LoginEvent): Promise<void>;
  recentLogins(username: string, limit: number): Promise<LoginEvent[]>;
}
