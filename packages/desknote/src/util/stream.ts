export type LineHandler = (line: string) => boolean | void;

export namespace Stream {
  /**
   * Feeds every complete, non-blank line of `stream` to `onLine`. Stops early
   * when `onLine` returns true. Resolves to the number of lines handled.
   */
  export async function toLines(
    stream: AsyncIterable<Uint8Array | string>,
    onLine: LineHandler,
  ): Promise<number> {
    const decoder = new TextDecoder('utf-8', { fatal: false });
    let pending = '';
    let handled = 0;

    const emit = (raw: string) => {
      const line = raw.trim();

      if (line === '') {
        return false;
      }

      handled += 1;
      return onLine(line) === true;
    };

    for await (const chunk of stream) {
      pending += typeof chunk === 'string' ? chunk : decoder.decode(chunk, { stream: true });

      let newline = pending.indexOf('\n');

      while (newline !== -1) {
        const line = pending.slice(0, newline);
        pending = pending.slice(newline + 1);

        if (emit(line)) {
          return handled;
        }

        newline = pending.indexOf('\n');
      }
    }

    pending += decoder.decode();
    emit(pending);

    return handled;
  }
}
