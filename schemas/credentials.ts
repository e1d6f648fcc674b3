import { z } from "zod";

const username = z.string().trim().min(1, "Please enter username and password");
const password = z.string().min(1, "Please enter username and password");

export const loginSchema = z.object({ username, password });

export const registrationSchema = z
  .object({
    username,
    password,
    confirm_password: z.string(),
  })
  .refine((body) => body.password === body.confirm_password, {
    message: "Passwords do not match",
    path: ["confirm_password"],
  });

export const tokenClaimsSchema = z.object({
  sub: z.string().min(1),
});

export type LoginBody = z.infer<typeof loginSchema>;
export type RegistrationBody = z.infer<typeof registrationSchema>;
