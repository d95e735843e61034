import { CATEGORY_ID_MARKERS } from "./rules";
import type { MicrodoseCategory, MicrodoseSession, SessionKind } from "./types";

export function realSession(session: MicrodoseSession): SessionKind {
  return { kind: "real", session };
}

export function shownButSkipped(definitionId: string, shownAt: Date): SessionKind {
  return { kind: "shown_but_skipped", definitionId, shownAt };
}

export function getEntryDefinitionId(entry: SessionKind): string {
  return entry.kind === "real" ? entry.session.definitionId : entry.definitionId;
}

export function getEntryTimestamp(entry: SessionKind): Date {
  return entry.kind === "real" ? entry.session.performedAt : entry.shownAt;
}

export function inferCategoryFromDefinitionId(definitionId: string): MicrodoseCategory | undefined {
  const match = CATEGORY_ID_MARKERS.find(({ markers }) =>
    markers.some((marker) => definitionId.includes(marker))
  );
  return match?.category;
}

/** Newest first; entries with equal timestamps keep their input order. */
export function sortHistoryByDateDesc(history: SessionKind[]): SessionKind[] {
  return [...history].sort(
    (a, b) => getEntryTimestamp(b).getTime() - getEntryTimestamp(a).getTime()
  );
}

export function getMostRecentEntry(history: SessionKind[]): SessionKind | undefined {
  return sortHistoryByDateDesc(history)[0];
}

export function findLastEntryByCategory(
  history: SessionKind[],
  category: MicrodoseCategory
): SessionKind | undefined {
  return sortHistoryByDateDesc(history).find(
    (entry) => inferCategoryFromDefinitionId(getEntryDefinitionId(entry)) === category
  );
}
