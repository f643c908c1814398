import { createTestEnv, TestEnv } from "./testContext";
import { AuthenticationError, ConflictError, ValidationError } from "../domain/errors";
import { toPublicUser } from "../domain/user";

describe("AccountService", () => {
  let env: TestEnv;

  const validInput = {
    username: "dana",
    email: "dana@example.com",
    password: "secret-pw",
    firstName: "Dana",
    lastName: "Fields",
    role: "organizer",
  };

  beforeEach(() => {
    env = createTestEnv();
  });

  afterEach(() => env.cleanup());

  describe("register", () => {
    it("creates a user with a hashed password", () => {
      const user = env.services.accounts.register(validInput);

      expect(user.username).toBe("dana");
      expect(user.role).toBe("organizer");
      expect(user.passwordHash).toMatch(/^scrypt\$[0-9a-f]{32}\$[0-9a-f]{128}$/);
      expect(user.passwordHash).not.toContain("secret-pw");
    });

    it("trims text fields", () => {
      const user = env.services.accounts.register({ ...validInput, username: "  dana  " });

      expect(user.username).toBe("dana");
    });

    it.each([
      [{ username: "abc" }, "Username must be at least 4 characters"],
      [{ username: "a".repeat(21) }, "Username must be at most 20 characters"],
      [{ email: "not-an-email" }, "Email is not a valid address"],
      [{ password: "12345" }, "Password must be at least 6 characters"],
      [{ firstName: "" }, "First name is required"],
      [{ role: "admin" }, 'Role must be "organizer" or "participant"'],
    ])("rejects %o", (override, message) => {
      expect(() => env.services.accounts.register({ ...validInput, ...override })).toThrow(
        new ValidationError(message)
      );
    });

    it("rejects a taken username with ConflictError", () => {
      env.services.accounts.register(validInput);

      expect(() =>
        env.services.accounts.register({ ...validInput, email: "other@example.com" })
      ).toThrow(ConflictError);
    });
  });

  describe("authenticate", () => {
    it("returns the user for correct credentials", () => {
      const user = env.services.accounts.register(validInput);

      expect(env.services.accounts.authenticate("dana", "secret-pw").id).toBe(user.id);
    });

    it("gives the same error for a wrong password and an unknown user", () => {
      env.services.accounts.register(validInput);

      expect(() => env.services.accounts.authenticate("dana", "wrong-pw")).toThrow(
        new AuthenticationError("Invalid username or password")
      );
      expect(() => env.services.accounts.authenticate("nobody", "secret-pw")).toThrow(
        new AuthenticationError("Invalid username or password")
      );
    });

    it("rejects missing credentials", () => {
      expect(() => env.services.accounts.authenticate(undefined, undefined)).toThrow(AuthenticationError);
    });
  });

  describe("updateProfile", () => {
    it("updates names but role stays fixed", () => {
      const user = env.services.accounts.register(validInput);

      const updated = env.services.accounts.updateProfile(user, { firstName: "Dee" });

      expect(updated.firstName).toBe("Dee");
      expect(updated.role).toBe("organizer");
    });
  });

  it("toPublicUser drops the password hash", () => {
    const user = env.services.accounts.register(validInput);

    expect(toPublicUser(user)).not.toHaveProperty("passwordHash");
  });
});
