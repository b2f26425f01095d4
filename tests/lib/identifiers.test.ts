import { describe, expect, it } from "vitest";
import {
	asProfileUrl,
	isLoginLocation,
	isProfileId,
	listLinkSelectorName,
	loginUrl,
	normalizeProfileId,
} from "../../src/lib/identifiers.js";

describe("identifiers", () => {
	it("normalizes profile references", () => {
		expect(normalizeProfileId("@@maria.silva")).toBe("maria.silva");
		expect(normalizeProfileId("maria_s/")).toBe("maria_s");
		expect(normalizeProfileId("https://www.instagram.com/maria_s/followers/")).toBe("maria_s");
		expect(normalizeProfileId("https://")).toBe("");
	});

	it("validates profile ids", () => {
		expect(isProfileId("@maria.silva")).toBe(true);
		expect(isProfileId("not a name")).toBe(false);
		expect(isProfileId("")).toBe(false);
	});

	it("builds profile and login urls", () => {
		expect(asProfileUrl("@maria_s", "https://social.test/")).toBe("https://social.test/maria_s/");
		expect(asProfileUrl("maria_s")).toBe("https://www.instagram.com/maria_s/");
		expect(loginUrl("https://social.test//")).toBe("https://social.test/accounts/login/");
	});

	it("recognizes the login page by path", () => {
		const base = "https://social.test";
		expect(isLoginLocation("https://social.test/accounts/login/", base)).toBe(true);
		expect(isLoginLocation("https://social.test/accounts/login", base)).toBe(true);
		expect(isLoginLocation("https://social.test/accounts/login/?next=%2F", base)).toBe(true);
		expect(isLoginLocation("https://social.test/", base)).toBe(false);
		expect(isLoginLocation("https://social.test/accounts/login/two_factor/", base)).toBe(false);
		expect(isLoginLocation("https://other.test/accounts/login/", base)).toBe(false);
		expect(isLoginLocation("about:blank", base)).toBe(false);
	});

	it("treats the www and bare hosts as the same login page", () => {
		expect(
			isLoginLocation("https://instagram.com/accounts/login/", "https://www.instagram.com"),
		).toBe(true);
		expect(
			isLoginLocation("https://www.social.test/accounts/login/?next=%2F", "https://social.test"),
		).toBe(true);
		expect(isLoginLocation("https://instagram.com/", "https://www.instagram.com")).toBe(false);
	});

	it("maps list kinds to their entry point selector", () => {
		expect(listLinkSelectorName("followers")).toBe("FOLLOWERS_LINK");
		expect(listLinkSelectorName("following")).toBe("FOLLOWING_LINK");
	});
});
