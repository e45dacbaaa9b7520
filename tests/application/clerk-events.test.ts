import { beforeEach, describe, expect, it, vi } from "vitest";
import {
  ClerkUserData,
  deriveUsername,
  handleSessionCreated,
  handleUserCreated,
  handleUserDeleted,
  handleUserUpdated,
} from "../../src/application/clerk-events";
import { ValidationError } from "../../src/domain/errors/errors";
import { InMemoryUserDirectory, makeUser } from "../support/in-memory-user-directory";

const clerkUser = (overrides: Partial<ClerkUserData> = {}): ClerkUserData => ({
  id: "user_2abc123456",
  username: null,
  first_name: "Asha",
  last_name: "Rao",
  primary_email_address_id: "idn_2",
  email_addresses: [
    { id: "idn_1", email_address: "old@example.com" },
    { id: "idn_2", email_address: "asha.rao@example.com" },
  ],
  public_metadata: {},
  ...overrides,
});

describe("Clerk events", () => {
  let users: InMemoryUserDirectory;

  beforeEach(() => {
    users = new InMemoryUserDirectory();
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  describe("deriveUsername", () => {
    it("prefers the Clerk username", () => {
      expect(deriveUsername(clerkUser({ username: "asha_r" }))).toBe("asha_r");
    });

    it("falls back to the primary email's local part, then the id", () => {
      expect(deriveUsername(clerkUser())).toBe("asha.rao");
      expect(deriveUsername(clerkUser({ email_addresses: [] }))).toBe("user_2abc123456");
    });
  });

  describe("user.created", () => {
    it("creates the user from the primary email", async () => {
      const user = await handleUserCreated(users, clerkUser());

      expect(user).toMatchObject({
        clerkUserId: "user_2abc123456",
        username: "asha.rao",
        email: "asha.rao@example.com",
        firstName: "Asha",
        lastName: "Rao",
        role: undefined,
      });
    });

    it("is idempotent per Clerk user", async () => {
      await handleUserCreated(users, clerkUser());
      await handleUserCreated(users, clerkUser());

      expect(users.users).toHaveLength(1);
    });

    it("suffixes a username that is already taken", async () => {
      users.users.push(makeUser({ clerkUserId: "user_other", username: "asha.rao" }));

      const user = await handleUserCreated(users, clerkUser());

      expect(user.username).toBe("asha.rao-123456");
    });

    it("falls back to the Clerk id when the suffixed name is taken too", async () => {
      users.users.push(
        makeUser({ id: "user-7", clerkUserId: "user_other", username: "asha.rao" }),
        makeUser({ id: "user-8", clerkUserId: "user_third", username: "asha.rao-123456" })
      );

      const user = await handleUserCreated(users, clerkUser());

      expect(user.username).toBe("user_2abc123456");
    });

    it("takes a known role from public metadata", async () => {
      const admin = await handleUserCreated(users, clerkUser({ public_metadata: { role: "admin" } }));
      const unknown = await handleUserCreated(
        users,
        clerkUser({ id: "user_2xyz654321", username: "ravi", public_metadata: { role: "owner" } })
      );

      expect(admin.role).toBe("admin");
      expect(unknown.role).toBeUndefined();
    });

    it("refuses a user without an email address", async () => {
      await expect(
        handleUserCreated(users, clerkUser({ email_addresses: [] }))
      ).rejects.toThrow(ValidationError);
    });
  });

  describe("user.updated", () => {
    it("syncs identity fields and role", async () => {
      await handleUserCreated(users, clerkUser());

      const updated = await handleUserUpdated(
        users,
        clerkUser({ first_name: "Asha R.", public_metadata: { role: "staff" } })
      );

      expect(updated).toMatchObject({ firstName: "Asha R.", role: "staff", username: "asha.rao" });
    });

    it("removes a role that Clerk no longer carries", async () => {
      await handleUserCreated(users, clerkUser({ public_metadata: { role: "admin" } }));

      const updated = await handleUserUpdated(users, clerkUser({ public_metadata: {} }));

      expect(updated?.role).toBeUndefined();
      expect(users.users[0]).not.toHaveProperty("role");
    });

    it("keeps the stored email when Clerk sends none", async () => {
      await handleUserCreated(users, clerkUser());

      const updated = await handleUserUpdated(users, clerkUser({ email_addresses: [] }));

      expect(updated?.email).toBe("asha.rao@example.com");
    });
  });

  describe("user.deleted", () => {
    it("removes the user when an id is present", async () => {
      await handleUserCreated(users, clerkUser());

      await expect(handleUserDeleted(users, {})).resolves.toBe(false);
      await expect(handleUserDeleted(users, { id: "user_2abc123456" })).resolves.toBe(true);
      expect(users.users).toHaveLength(0);
    });
  });

  describe("session.created", () => {
    it("records a login for a known user", async () => {
      await handleUserCreated(users, clerkUser());
      const loginTime = new Date(2026, 9, 19, 8, 15);

      const event = await handleSessionCreated(users, {
        id: "sess_1",
        user_id: "user_2abc123456",
        created_at: loginTime.getTime(),
      });

      expect(event).toEqual({
        username: "asha.rao",
        loginTime,
        loginDate: "2026-10-19",
        sessionId: "sess_1",
        source: "clerk",
      });
      expect(users.logins).toHaveLength(1);
    });

    it("skips sessions of unknown users", async () => {
      const event = await handleSessionCreated(users, {
        id: "sess_2",
        user_id: "user_missing",
        created_at: Date.now(),
      });

      expect(event).toBeNull();
      expect(users.logins).toHaveLength(0);
    });
  });
});
