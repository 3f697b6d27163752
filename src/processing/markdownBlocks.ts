const FENCE = /^\s*(`{3,}|~{3,})\s*([\w#+.-]*)/;

export interface FencedBlock {
  language: string;
  code: string;
  /** Offset of the opening fence line in the source text. */
  start: number;
  /** Offset just past the closing fence line. */
  end: number;
}

/**
 * Splits markdown into blocks separated by blank lines. Fenced code blocks are
 * kept whole even when they contain blank lines.
 */
export function splitBlocks(markdown: string): string[] {
  const blocks: string[] = [];
  let current: string[] = [];
  let openFence: string | undefined;

  const flush = (): void => {
    const block = current.join('\n').trim();
    if (block) {
      blocks.push(block);
    }
    current = [];
  };

  for (const line of markdown.split(/\r?\n/)) {
    const fence = FENCE.exec(line)?.[1];

    if (openFence) {
      current.push(line);
      if (fence && fence.startsWith(openFence) && line.trim() === fence) {
        openFence = undefined;
      }
      continue;
    }

    if (fence) {
      openFence = fence;
      current.push(line);
      continue;
    }

    if (line.trim() === '') {
      flush();
      continue;
    }

    current.push(line);
  }

  flush();
  return blocks;
}

export function findFencedBlocks(markdown: string): FencedBlock[] {
  const blocks: FencedBlock[] = [];
  const lines = markdown.split('\n');
  let offset = 0;
  let open: { fence: string; language: string; start: number; body: string[] } | undefined;

  for (const line of lines) {
    const lineEnd = offset + line.length + 1;
    const match = FENCE.exec(line);

    if (open) {
      if (match?.[1] && match[1].startsWith(open.fence) && line.trim() === match[1]) {
        blocks.push({
          language: open.language,
          code: open.body.join('\n').replace(/\r/g, ''),
          start: open.start,
          end: Math.min(lineEnd, markdown.length),
        });
        open = undefined;
      } else {
        open.body.push(line);
      }
    } else if (match?.[1]) {
      open = { fence: match[1], language: match[2] ?? '', start: offset, body: [] };
    }

    offset = lineEnd;
  }

  return blocks;
}
