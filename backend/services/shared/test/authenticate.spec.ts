// backend/services/shared/test/authenticate.spec.ts
import express from "express";
import jwt from "jsonwebtoken";
import request from "supertest";
import { describe, expect, it } from "vitest";
import { authenticate, signAdminToken, verifyAdminToken } from "../middleware/authenticate";
import { errorProblemJson } from "../middleware/problemJson";

const SECRET = "test-secret";
const CLAIMS = { sub: "0123456789abcdef01234567", username: "curator", isSuperuser: true };

function guarded() {
  const app = express();
  app.get("/private", authenticate(SECRET), (req, res) => {
    res.json({ admin: req.admin });
  });
  app.use(errorProblemJson({ apiPrefixes: ["/"] }));
  return app;
}

describe("signAdminToken / verifyAdminToken", () => {
  it("round-trips the claims", () => {
    const token = signAdminToken(CLAIMS, SECRET, 60);
    expect(verifyAdminToken(token, SECRET)).toEqual(CLAIMS);
  });

  it("rejects a token signed with another secret", () => {
    const token = signAdminToken(CLAIMS, "other-secret", 60);
    expect(() => verifyAdminToken(token, SECRET)).toThrow();
  });

  it("rejects a token without a subject", () => {
    const token = jwt.sign({ username: "curator" }, SECRET, { algorithm: "HS256" });
    expect(() => verifyAdminToken(token, SECRET)).toThrow("Invalid token: missing subject");
  });
});

describe("authenticate", () => {
  it("puts the verified claims on req.admin", async () => {
    const token = signAdminToken(CLAIMS, SECRET, 60);
    const r = await request(guarded())
      .get("/private")
      .set("Authorization", `Bearer ${token}`)
      .expect(200);
    expect(r.body.admin).toEqual(CLAIMS);
  });

  it("401s on an expired token", async () => {
    const token = jwt.sign(
      { username: "curator", isSuperuser: true, exp: Math.floor(Date.now() / 1000) - 10 },
      SECRET,
      { subject: CLAIMS.sub, algorithm: "HS256" }
    );
    const r = await request(guarded())
      .get("/private")
      .set("Authorization", `Bearer ${token}`)
      .expect(401);
    expect(r.body.detail).toBe("Invalid or expired token");
  });

  it("401s on a non-bearer scheme", async () => {
    const r = await request(guarded()).get("/private").set("Authorization", "Basic abc").expect(401);
    expect(r.body.detail).toBe("Missing or malformed Authorization header");
  });
});
