/**
 * Tests for result normalization.
 */

import { describe, it, expect } from "vitest";
import { PROFILE_FIELD_MAPS } from "../client";
import { ResultNormalizer, splitScopes } from "../strategy";
import { createToken } from "../types/token";

describe("splitScopes", () => {
  it("should split on the delimiter", () => {
    expect(splitScopes("read,write")).toEqual(["read", "write"]);
  });

  it("should return an empty list for an empty or missing scope", () => {
    expect(splitScopes("")).toEqual([]);
    expect(splitScopes(undefined)).toEqual([]);
    expect(splitScopes(42)).toEqual([]);
  });

  it("should trim entries, drop empties and keep first occurrences", () => {
    expect(splitScopes(" read , ,write,read")).toEqual(["read", "write"]);
  });

  it("should honour a custom delimiter", () => {
    expect(splitScopes("openid profile", " ")).toEqual(["openid", "profile"]);
  });
});

describe("ResultNormalizer", () => {
  const normalizer = new ResultNormalizer(PROFILE_FIELD_MAPS.direct);

  describe("credentials", () => {
    it("should map a full token", () => {
      const token = createToken({
        accessToken: "at-1",
        refreshToken: "rt-1",
        expiresAt: 1767232800,
        tokenType: "Bearer",
        extra: { scope: "read,write", open_id: "ou_1" },
      });

      expect(normalizer.credentials(token)).toEqual({
        token: "at-1",
        refreshToken: "rt-1",
        expiresAt: 1767232800,
        tokenType: "Bearer",
        noExpiry: false,
        scopes: ["read", "write"],
        other: { scope: "read,write", open_id: "ou_1" },
      });
    });

    it("should flag tokens without expiry", () => {
      const credentials = normalizer.credentials(
        createToken({ accessToken: "at-1", tokenType: "Bearer" })
      );

      expect(credentials.noExpiry).toBe(true);
      expect(credentials.expiresAt).toBeNull();
      expect(credentials.refreshToken).toBeNull();
      expect(credentials.scopes).toEqual([]);
    });
  });

  describe("info", () => {
    it("should pick mapped string fields", () => {
      expect(
        normalizer.info({
          name: "Lin",
          avatar_url: "https://img.example.com/lin.png",
          email: "lin@example.com",
        })
      ).toEqual({
        nickname: "Lin",
        name: "Lin",
        image: "https://img.example.com/lin.png",
        email: "lin@example.com",
      });
    });

    it("should null out missing and non-string fields", () => {
      expect(normalizer.info({ name: 42 })).toEqual({
        nickname: null,
        name: null,
        image: null,
        email: null,
      });
    });

    it("should leave unmapped fields null", () => {
      const miniapp = new ResultNormalizer(PROFILE_FIELD_MAPS.miniapp);

      expect(miniapp.info({ nickName: "Lin", avatarUrl: "https://img.example.com/lin.png" })).toEqual({
        nickname: "Lin",
        name: null,
        image: "https://img.example.com/lin.png",
        email: null,
      });
    });
  });

  describe("rawInfo", () => {
    it("should carry the token and a frozen copy of the profile", () => {
      const token = createToken({ accessToken: "at-1", tokenType: "Bearer" });
      const profile = { open_id: "ou_1" };

      const raw = normalizer.rawInfo(token, profile);
      profile.open_id = "changed";

      expect(raw.token).toBe(token);
      expect(raw.user).toEqual({ open_id: "ou_1" });
      expect(Object.isFrozen(raw.user)).toBe(true);
    });
  });
});
