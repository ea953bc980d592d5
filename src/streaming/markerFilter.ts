/**
 * Removes an in-band control marker from streamed model output.
 *
 * The marker may arrive split over any number of fragments, so the last
 * `marker.length - 1` characters are withheld until the next fragment (or
 * `flush`) proves they are not the start of a marker.
 */
export class MarkerFilter {
  private readonly marker: string;
  private readonly lookback: number;
  // Not yet emitted.
  private pending = "";
  // Last `lookback` characters already emitted.
  private emittedTail = "";
  private accumulated = "";
  private seen = false;

  constructor(marker: string) {
    if (!marker) throw new Error("MarkerFilter requires a non-empty marker");
    this.marker = marker;
    this.lookback = marker.length - 1;
  }

  get markerSeen(): boolean {
    return this.seen;
  }

  /** Everything emitted so far, marker-free. */
  get text(): string {
    return this.accumulated;
  }

  /**
   * Feeds one fragment and returns the part that is safe to forward now
   * (possibly empty).
   */
  push(fragment: string): string {
    if (!fragment) return "";
    this.pending += fragment;
    this.strip();

    if (this.pending.length <= this.lookback) return "";
    const cut = this.pending.length - this.lookback;
    const ready = this.pending.slice(0, cut);
    this.pending = this.pending.slice(cut);
    return this.emit(ready);
  }

  /** Releases whatever is still withheld. Call once, at end of stream. */
  flush(): string {
    this.strip();
    const rest = this.pending;
    this.pending = "";
    return this.emit(rest);
  }

  /**
   * Removes every occurrence of the marker from the pending text. An
   * occurrence that starts inside already-emitted text (it can only appear
   * after a removal joins two pieces) loses its pending part instead, so the
   * concatenated output never contains the marker.
   */
  private strip(): void {
    const tailLen = this.emittedTail.length;
    let window = this.emittedTail + this.pending;
    let from = 0;

    for (;;) {
      const idx = window.indexOf(this.marker, from);
      if (idx < 0) break;
      this.seen = true;
      const cutStart = Math.max(idx, tailLen);
      window = window.slice(0, cutStart) + window.slice(idx + this.marker.length);
      from = Math.max(0, cutStart - this.lookback);
    }

    this.pending = window.slice(tailLen);
  }

  private emit(text: string): string {
    if (!text) return "";
    this.accumulated += text;
    this.emittedTail = this.lookback === 0 ? "" : (this.emittedTail + text).slice(-this.lookback);
    return text;
  }
}

export type FilteredStreamEvent =
  | { type: "fragment"; text: string }
  | {
      type: "end";
      // Text released by the final flush; may be empty.
      tail: string;
      // Full filtered text, fragments and tail included.
      text: string;
      markerSeen: boolean;
    };

/**
 * Runs `source` through a fresh MarkerFilter. Yields at most one fragment
 * per source fragment, in source order, then exactly one `end` event.
 * Errors from `source` propagate and no `end` event is produced.
 */
export async function* filterMarkerStream(
  source: AsyncIterable<string>,
  marker: string
): AsyncGenerator<FilteredStreamEvent, void, undefined> {
  const filter = new MarkerFilter(marker);

  for await (const fragment of source) {
    const safe = filter.push(fragment);
    if (safe) yield { type: "fragment", text: safe };
  }

  const tail = filter.flush();
  yield { type: "end", tail, text: filter.text, markerSeen: filter.markerSeen };
}
