export type KeywordMatchMode = "substring" | "exact";

export function normalizeControlText(value: string | null | undefined): string {
	if (!value) return "";
	return value.replace(/\s+/g, " ").trim().toLocaleLowerCase();
}

export function matchesKeyword(
	text: string | null | undefined,
	keywords: readonly string[],
	mode: KeywordMatchMode = "substring",
): boolean {
	const normalized = normalizeControlText(text);
	if (!normalized) return false;

	return keywords.some((keyword) => {
		const candidate = normalizeControlText(keyword);
		if (!candidate) return false;
		return mode === "exact"
			? normalized === candidate
			: normalized.includes(candidate);
	});
}
