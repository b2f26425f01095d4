import type { ListKind } from "./types.js";

export const DEFAULT_BASE_URL = "https://www.instagram.com";
export const LOGIN_PATH = "/accounts/login/";

const PROFILE_PATTERN = /^[A-Za-z0-9._]{1,30}$/;

export function normalizeBaseUrl(baseUrl: string): string {
	return baseUrl.replace(/\/+$/, "");
}

function trimSlashes(pathname: string): string {
	return pathname.replace(/\/+$/, "") || "/";
}

export function normalizeProfileId(value: string): string {
	const trimmed = value.trim();
	if (trimmed.startsWith("http://") || trimmed.startsWith("https://")) {
		try {
			const segment = new URL(trimmed).pathname.split("/").filter(Boolean)[0];
			return segment ?? "";
		} catch {
			return "";
		}
	}
	return trimmed.replace(/^@+/, "").replace(/\/+$/, "");
}

export function isProfileId(value: string): boolean {
	return PROFILE_PATTERN.test(normalizeProfileId(value));
}

export function asProfileUrl(profile: string, baseUrl = DEFAULT_BASE_URL): string {
	return `${normalizeBaseUrl(baseUrl)}/${encodeURIComponent(normalizeProfileId(profile))}/`;
}

export function loginUrl(baseUrl = DEFAULT_BASE_URL): string {
	return `${normalizeBaseUrl(baseUrl)}${LOGIN_PATH}`;
}

function bareHost(host: string): string {
	return host.replace(/^www\./, "");
}

/**
 * True while the browser still shows the login form, on the bare or the
 * `www.` host, including the `?next=` and trailing-slash variants of the
 * login route.
 */
export function isLoginLocation(url: string, baseUrl = DEFAULT_BASE_URL): boolean {
	const expected = new URL(loginUrl(baseUrl));
	let current: URL;
	try {
		current = new URL(url);
	} catch {
		return false;
	}

	return (
		bareHost(current.host) === bareHost(expected.host) &&
		trimSlashes(current.pathname) === trimSlashes(expected.pathname)
	);
}

export function listLinkSelectorName(
	kind: ListKind,
): "FOLLOWERS_LINK" | "FOLLOWING_LINK" {
	return kind === "followers" ? "FOLLOWERS_LINK" : "FOLLOWING_LINK";
}
