import { z } from "zod";

export const UpdateProfileDto = z.object({
  email: z.string().trim().email().optional(),
  fullName: z.string().trim().max(100).optional(),
  city: z.string().trim().max(100).optional(),
  area: z.string().trim().max(100).optional(),
  age: z.number().int().min(10).max(120).optional(),
  phone: z.string().trim().max(30).optional(),
  occupation: z.string().trim().max(100).optional(),
  householdSize: z.number().int().min(1).max(20).optional(),
});

export const RoleClaimsDto = z.object({
  role: z.enum(["admin", "staff"]).optional(),
});

export const SessionClaimsDto = z.object({
  metadata: RoleClaimsDto.optional(),
});
