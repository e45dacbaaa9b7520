import { formatDateKey } from "../domain/dates";
import { RoleClaimsDto } from "../domain/dtos/user";
import { ValidationError } from "../domain/errors/errors";
import { LoginEvent, Role, UserAccount } from "../domain/types";
import { UserDirectory } from "./user-directory";

// The parts of Clerk's webhook payloads this service reads.
export type ClerkUserData = {
  id: string;
  username: string | null;
  first_name: string | null;
  last_name: string | null;
  primary_email_address_id: string | null;
  email_addresses: { id: string; email_address: string }[];
  public_metadata: Record<string, unknown>;
};

export type ClerkSessionData = {
  id: string;
  user_id: string;
  created_at: number;
};

const primaryEmail = (data: ClerkUserData): string | undefined => {
  const primary = data.email_addresses.find(
    (address) => address.id === data.primary_email_address_id
  );
  return (primary ?? data.email_addresses[0])?.email_address;
};

const roleOf = (data: ClerkUserData): Role | undefined => {
  const result = RoleClaimsDto.safeParse(data.public_metadata);
  return result.success ? result.data.role : undefined;
};

/** Clerk username, else the email's local part, else the Clerk id. */
export const deriveUsername = (data: ClerkUserData): string => {
  if (data.username) {
    return data.username;
  }
  const email = primaryEmail(data);
  if (email) {
    return email.split("@")[0];
  }
  return data.id;
};

/**
 * The derived username, else that name suffixed with the end of the Clerk id,
 * else the Clerk id itself, which is unique in Clerk.
 */
const availableUsername = async (users: UserDirectory, data: ClerkUserData) => {
  const preferred = deriveUsername(data);
  const candidates = [preferred, `${preferred}-${data.id.slice(-6)}`];
  for (const candidate of candidates) {
    if (!(await users.findByUsername(candidate))) {
      return candidate;
    }
  }
  return data.id;
};

export const handleUserCreated = async (
  users: UserDirectory,
  data: ClerkUserData
): Promise<UserAccount> => {
  const existing = await users.findByClerkUserId(data.id);
  if (existing) {
    console.log("[Webhook] User already exists");
    return existing;
  }

  const email = primaryEmail(data);
  if (!email) {
    throw new ValidationError(`Clerk user ${data.id} has no email address`);
  }

  const username = await availableUsername(users, data);

  return users.create({
    clerkUserId: data.id,
    username,
    email,
    firstName: data.first_name ?? "",
    lastName: data.last_name ?? "",
    role: roleOf(data),
  });
};

export const handleUserUpdated = async (users: UserDirectory, data: ClerkUserData) =>
  users.updateIdentity(data.id, {
    email: primaryEmail(data),
    firstName: data.first_name ?? "",
    lastName: data.last_name ?? "",
    // Clerk's metadata is authoritative: no role there means no role here
    role: roleOf(data) ?? null,
  });

/**
 * Consumption records stay behind; removing them is an administrative task.
 */
export const handleUserDeleted = async (users: UserDirectory, data: { id?: string }) => {
  if (!data.id) {
    return false;
  }
  return users.deleteByClerkUserId(data.id);
};

export const handleSessionCreated = async (
  users: UserDirectory,
  data: ClerkSessionData
): Promise<LoginEvent | null> => {
  const user = await users.findByClerkUserId(data.user_id);
  if (!user) {
    console.log(`[Webhook] No user for session ${data.id}`);
    return null;
  }

  const loginTime = new Date(data.created_at);
  const event: LoginEvent = {
    username: user.username,
    loginTime,
    loginDate: formatDateKey(loginTime),
    sessionId: data.id,
    source: "clerk",
  };
  await users.recordLogin(event);
  return event;
};
