/**
 * SlideOrder - Presentation sequence of global slide ids.
 *
 * Independent of document page order. Owns the current position so every
 * mutation can keep it pointing at the same slide.
 */

import type { SlideId } from '@pdfdeck/shared';

export class SlideOrder {
  private ids: SlideId[] = [];
  private current = 0;

  constructor(initial: Iterable<SlideId> = []) {
    this.append(initial);
  }

  get length(): number {
    return this.ids.length;
  }

  get currentPosition(): number {
    return this.current;
  }

  /** Slide at the current position, or null for an empty deck. */
  get currentSlide(): SlideId | null {
    return this.ids[this.current] ?? null;
  }

  toArray(): SlideId[] {
    return [...this.ids];
  }

  isValidPosition(position: number): boolean {
    return Number.isInteger(position) && position >= 0 && position < this.ids.length;
  }

  /**
   * Append ids to the end. Ids already in the order are skipped.
   * Returns the ids actually added.
   */
  append(ids: Iterable<SlideId>): SlideId[] {
    const present = new Set(this.ids);
    const added: SlideId[] = [];
    for (const id of ids) {
      if (present.has(id)) continue;
      present.add(id);
      added.push(id);
    }
    this.ids.push(...added);
    this.clampCurrent();
    return added;
  }

  /**
   * Move the slide at `from` to `to`. The current position follows the slide
   * it pointed at. Returns false (and changes nothing) for out-of-range
   * indices or `from === to`.
   */
  move(from: number, to: number): boolean {
    if (!this.isValidPosition(from) || !this.isValidPosition(to) || from === to) {
      return false;
    }

    const [id] = this.ids.splice(from, 1);
    this.ids.splice(to, 0, id);

    if (this.current === from) {
      this.current = to;
    } else if (from < this.current && this.current <= to) {
      this.current--;
    } else if (to <= this.current && this.current < from) {
      this.current++;
    }
    this.clampCurrent();
    return true;
  }

  /**
   * Remove the slide at `position`. The last remaining slide cannot be removed.
   * When the current slide is removed the position lands on the next slide,
   * or the new last slide.
   */
  delete(position: number): boolean {
    if (this.ids.length <= 1 || !this.isValidPosition(position)) {
      return false;
    }

    this.ids.splice(position, 1);

    if (this.current >= this.ids.length) {
      this.current = this.ids.length - 1;
    } else if (this.current > position) {
      this.current--;
    }
    this.clampCurrent();
    return true;
  }

  setCurrent(position: number): boolean {
    if (!this.isValidPosition(position)) return false;
    this.current = position;
    return true;
  }

  private clampCurrent(): void {
    if (this.ids.length === 0) {
      this.current = 0;
      return;
    }
    this.current = Math.min(Math.max(this.current, 0), this.ids.length - 1);
  }
}
