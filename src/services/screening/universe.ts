import { Board, Stock, StockListing } from '../../domain/contracts';

const SCREENED_BOARDS: ReadonlySet<Board> = new Set<Board>(['main', 'chinext', 'star']);

export function classifyBoard(code: string): Board | null {
  if (code.startsWith('60') || code.startsWith('00')) {
    return 'main';
  }
  if (code.startsWith('30')) {
    return 'chinext';
  }
  if (code.startsWith('68')) {
    return 'star';
  }
  if (code.startsWith('4') || code.startsWith('8') || code.startsWith('92')) {
    return 'beijing';
  }
  return null;
}

/** Special-treatment (ST, *ST) and delisting-period names are excluded. */
export function isFlaggedName(name: string): boolean {
  return name.includes('ST') || name.includes('退');
}

export interface Universe {
  stocks: Stock[];
  names: Record<string, string>;
}

/**
 * Derives the screenable universe: Shanghai/Shenzhen main board, ChiNext and
 * STAR, minus flagged names. `names` covers every listing, screened or not.
 */
export function buildUniverse(listings: StockListing[]): Universe {
  const names: Record<string, string> = {};
  const stocks: Stock[] = [];
  const seen = new Set<string>();

  for (const listing of listings) {
    const code = listing.code.trim().padStart(6, '0');
    const name = listing.name.trim();
    names[code] = name;

    if (seen.has(code) || isFlaggedName(name)) {
      continue;
    }
    const board = classifyBoard(code);
    if (!board || !SCREENED_BOARDS.has(board)) {
      continue;
    }
    seen.add(code);
    stocks.push({ code, name, board });
  }

  return { stocks, names };
}
