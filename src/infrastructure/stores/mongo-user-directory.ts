import mongoose from "mongoose";
import {
  IdentityUpdate,
  ProfileUpdate,
  UserDirectory,
} from "../../application/user-directory";
import { toDatabaseError } from "../../domain/errors/errors";
import { LoginEvent, NewUserAccount, Role, UserAccount } from "../../domain/types";
import { getLoginEventModel, LoginEventModel } from "../entities/LoginEvent";
import { getUserModel, UserModel } from "../entities/User";

type StoredUser = {
  _id: { toString(): string };
  clerkUserId: string;
  username: string;
  email: string;
  firstName?: string | null;
  lastName?: string | null;
  role?: string | null;
  profile?: {
    fullName?: string | null;
    city?: string | null;
    area?: string | null;
    age?: number | null;
    phone?: string | null;
    occupation?: string | null;
    householdSize?: number | null;
  } | null;
  createdAt?: Date;
};

const parseRole = (value: string | null | undefined): Role | undefined =>
  value === "admin" || value === "staff" ? value : undefined;

const toUserAccount = (user: StoredUser): UserAccount => ({
  id: user._id.toString(),
  clerkUserId: user.clerkUserId,
  username: user.username,
  email: user.email,
  firstName: user.firstName ?? "",
  lastName: user.lastName ?? "",
  role: parseRole(user.role),
  profile: {
    fullName: user.profile?.fullName ?? "",
    city: user.profile?.city ?? "",
    area: user.profile?.area ?? "",
    age: user.profile?.age ?? 0,
    phone: user.profile?.phone ?? "",
    occupation: user.profile?.occupation ?? "",
    householdSize: user.profile?.householdSize ?? 1,
  },
  createdAt: user.createdAt,
});

// Storage failures leave the directory as DatabaseError; schema validation
// errors keep their name so they still answer 400.
const guarded = async <T>(message: string, operation: () => Promise<T>): Promise<T> => {
  try {
    return await operation();
  } catch (error) {
    if (error instanceof mongoose.Error.ValidationError) {
      throw error;
    }
    throw toDatabaseError(error, message);
  }
};

export class MongoUserDirectory implements UserDirectory {
  private readonly users: UserModel;
  private readonly logins: LoginEventModel;

  constructor(connection: mongoose.Connection) {
    this.users = getUserModel(connection);
    this.logins = getLoginEventModel(connection);
  }

  async findByClerkUserId(clerkUserId: string): Promise<UserAccount | null> {
    return guarded("Failed to look up user", async () => {
      const user = await this.users.findOne({ clerkUserId }).lean().exec();
      return user ? toUserAccount(user) : null;
    });
  }

  async findByUsername(username: string): Promise<UserAccount | null> {
    return guarded("Failed to look up user", async () => {
      const user = await this.users.findOne({ username }).lean().exec();
      return user ? toUserAccount(user) : null;
    });
  }

  async listAll(): Promise<UserAccount[]> {
    return guarded("Failed to list users", async () => {
      const users = await this.users.find().sort({ createdAt: -1 }).lean().exec();
      return users.map(toUserAccount);
    });
  }

  async create(user: NewUserAccount): Promise<UserAccount> {
    return guarded("Failed to create user", async () => {
      const created = await this.users.create(user);
      return toUserAccount(created.toObject());
    });
  }

  async updateIdentity(clerkUserId: string, update: IdentityUpdate): Promise<UserAccount | null> {
    const { role, ...identity } = update;
    const changes: Record<string, unknown> = {};
    for (const [field, value] of Object.entries(identity)) {
      if (value !== undefined) {
        changes[field] = value;
      }
    }
    if (role) {
      changes.role = role;
    }

    // $set drops undefined keys, so removing the role takes an explicit $unset
    const operations =
      role === null ? { $set: changes, $unset: { role: "" } } : { $set: changes };

    return guarded("Failed to update user", async () => {
      const user = await this.users
        .findOneAndUpdate({ clerkUserId }, operations, { new: true, runValidators: true })
        .lean()
        .exec();
      return user ? toUserAccount(user) : null;
    });
  }

  async updateProfile(clerkUserId: string, update: ProfileUpdate): Promise<UserAccount | null> {
    const changes: Record<string, unknown> = {};
    if (update.email !== undefined) {
      changes.email = update.email;
    }
    for (const [field, value] of Object.entries(update.profile)) {
      if (value !== undefined) {
        changes[`profile.${field}`] = value;
      }
    }

    return guarded("Failed to update profile", async () => {
      const user = await this.users
        .findOneAndUpdate({ clerkUserId }, { $set: changes }, { new: true, runValidators: true })
        .lean()
        .exec();
      return user ? toUserAccount(user) : null;
    });
  }

  async deleteByClerkUserId(clerkUserId: string): Promise<boolean> {
    return guarded("Failed to delete user", async () => {
      const result = await this.users.deleteOne({ clerkUserId }).exec();
      return result.deletedCount > 0;
    });
  }

  async recordLogin(event: LoginEvent): Promise<void> {
    await guarded("Failed to record login", () => this.logins.create(event));
  }

  async recentLogins(username: string, limit: number): Promise<LoginEvent[]> {
    const events = await guarded("Failed to load login history", () =>
      this.logins.find({ username }).sort({ loginTime: -1 }).limit(limit).lean().exec()
    );

    return events.map((event) => ({
      username: event.username,
      loginTime: event.loginTime,
      loginDate: event.loginDate,
      sessionId: event.sessionId,
      source: event.source ?? "clerk",
    }));
  }
}
