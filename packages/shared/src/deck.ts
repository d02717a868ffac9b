/**
 * Deck view types shared by the server and the presenter/projector/organizer views.
 */

/** Session-unique id assigned to a page when it is imported. */
export type SlideId = number;

export type ViewRole = 'presenter' | 'projector' | 'organizer';

export const VIEW_ROLES = ['presenter', 'projector', 'organizer'] as const satisfies readonly ViewRole[];

export interface Size {
  width: number;
  height: number;
}

/** Where a slide's page comes from. */
export interface SlideSource {
  path: string;
  pageIndex: number;
}

export interface SlideSummary {
  slideId: SlideId;
  position: number;
  source: SlideSource;
  hasNotes: boolean;
}

export interface DeckSnapshot {
  currentFile: string | null;
  currentPosition: number;
  slides: SlideSummary[];
}

export interface PresentationSnapshot {
  presenting: boolean;
  position: number;
  slideId: SlideId | null;
  /** Scroll progress through a slide taller than the projector, 0 = top, 1 = bottom. */
  verticalOffset: number;
  notes: string;
  /** Bumped whenever the full-size images are re-rendered. */
  imageRevision: number;
}

export interface ImportFailure {
  path: string;
  message: string;
}

export interface LibraryEntry {
  name: string;
  path: string;
  kind: 'folder' | 'file';
  children?: LibraryEntry[];
}
