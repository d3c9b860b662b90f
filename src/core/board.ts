/**
 * Bit-packed tic-tac-toe board.
 *
 * Layout (18 bits):
 *   bits 9-17: maximizer (X) cells
 *   bits 0-8:  minimizer (O) cells
 * Each half is row-major with cell (0,0) the most significant bit, so the
 * cell (r, c) sits at offset 3*(2-r) + (2-c) within its half.
 *
 * Boards are plain numbers and never mutated; every placement yields a new value.
 */
import {
  Board,
  Move,
  Side,
  ALL_SIDES,
  SIDE_SYMBOLS,
  BOARD_SIZE,
  CELL_COUNT,
  MAXIMIZER_SHIFT,
} from './types';

const HALF_MASK = (1 << CELL_COUNT) - 1;

/**
 * Winning lines over a single 9-bit half.
 * Enumeration order decides the winner on malformed boards.
 */
export const LINE_MASKS: readonly number[] = [
  0b000000111, 0b000111000, 0b111000000, // rows (bottom, middle, top)
  0b001001001, 0b010010010, 0b100100100, // cols (right, middle, left)
  0b100010001, 0b001010100,              // diagonals
];

export function assertSide(value: unknown): asserts value is Side {
  if (!ALL_SIDES.some(s => s === value)) {
    throw new Error(`Invalid side: ${String(value)}. Valid sides: ${ALL_SIDES.join(', ')}`);
  }
}

export function opponent(side: Side): Side {
  return side === 'maximizer' ? 'minimizer' : 'maximizer';
}

export function symbol(side: Side): 'X' | 'O' {
  assertSide(side);
  return SIDE_SYMBOLS[side];
}

export function newGame(): Board {
  return 0;
}

function cellOffset(row: number, col: number): number {
  if (!Number.isInteger(row) || row < 0 || row >= BOARD_SIZE) {
    throw new RangeError(`Row out of range: ${row}`);
  }
  if (!Number.isInteger(col) || col < 0 || col >= BOARD_SIZE) {
    throw new RangeError(`Column out of range: ${col}`);
  }
  return BOARD_SIZE * (BOARD_SIZE - 1 - row) + (BOARD_SIZE - 1 - col);
}

/**
 * Single-bit mask for a cell in the given side's half.
 */
export function cellMask(row: number, col: number, side: Side): number {
  assertSide(side);
  const offset = cellOffset(row, col);
  return 1 << (side === 'maximizer' ? offset + MAXIMIZER_SHIFT : offset);
}

/** Occupancy of both halves folded onto the 9 cell bits. */
function occupied(board: Board): number {
  return (board | (board >>> MAXIMIZER_SHIFT)) & HALF_MASK;
}

/**
 * Place a mark for `side` at (row, col).
 * Returns null when the cell is already taken by either side.
 */
export function place(board: Board, row: number, col: number, side: Side): Board | null {
  const mask = cellMask(row, col, side);
  if (occupied(board) & (1 << cellOffset(row, col))) {
    return null;
  }
  return board | mask;
}

/**
 * Apply a mask produced by legalMoves. No occupancy check.
 */
export function placeMask(board: Board, mask: number): Board {
  return board | mask;
}

export function cellAt(board: Board, row: number, col: number): Side | null {
  const offset = cellOffset(row, col);
  if (board & (1 << (offset + MAXIMIZER_SHIFT))) return 'maximizer';
  if (board & (1 << offset)) return 'minimizer';
  return null;
}

/**
 * Unoccupied cells in row-major order.
 * Each call starts a fresh sequence.
 */
export function* legalMoves(board: Board, side: Side): Generator<Move> {
  assertSide(side);
  const taken = occupied(board);
  for (let row = 0; row < BOARD_SIZE; row++) {
    for (let col = 0; col < BOARD_SIZE; col++) {
      if (taken & (1 << cellOffset(row, col))) continue;
      yield { row, col, mask: cellMask(row, col, side) };
    }
  }
}

export function legalSuccessors(board: Board, side: Side): Board[] {
  const successors: Board[] = [];
  for (const move of legalMoves(board, side)) {
    successors.push(placeMask(board, move.mask));
  }
  return successors;
}

function popcount(bits: number): number {
  let count = 0;
  let n = bits;
  while (n) {
    n &= n - 1;
    count++;
  }
  return count;
}

export function emptyCount(board: Board): number {
  return CELL_COUNT - popcount(occupied(board));
}

export function isFull(board: Board): boolean {
  return emptyCount(board) === 0;
}

/**
 * Cells held by one side, as a 9-bit half.
 */
export function sideBits(board: Board, side: Side): number {
  return side === 'maximizer' ? (board >>> MAXIMIZER_SHIFT) & HALF_MASK : board & HALF_MASK;
}

/**
 * The side holding a full line, or null.
 * Lines are checked in LINE_MASKS order, minimizer before maximizer.
 */
export function winner(board: Board): Side | null {
  const o = sideBits(board, 'minimizer');
  const x = sideBits(board, 'maximizer');
  for (const line of LINE_MASKS) {
    if ((o & line) === line) return 'minimizer';
    if ((x & line) === line) return 'maximizer';
  }
  return null;
}

const ROW_SEPARATOR = '\n---+---+---\n';

export function renderBoard(board: Board): string {
  const rows: string[] = [];
  for (let row = 0; row < BOARD_SIZE; row++) {
    const cells: string[] = [];
    for (let col = 0; col < BOARD_SIZE; col++) {
      const side = cellAt(board, row, col);
      cells.push(side ? SIDE_SYMBOLS[side] : ' ');
    }
    rows.push(' ' + cells.join(' | '));
  }
  return rows.join(ROW_SEPARATOR);
}

function cellFromChar(ch: string): Side | null {
  switch (ch.toUpperCase()) {
    case 'X':
      return 'maximizer';
    case 'O':
      return 'minimizer';
    case '':
    case '.':
    case '-':
    case '_':
      return null;
    default:
      throw new Error(`Unrecognized board cell: "${ch}"`);
  }
}

/**
 * Parse a board from its rendered form, or from a compact form such as
 * "X.. / .O. / ..." (whitespace and slashes ignored).
 */
export function parseBoard(text: string): Board {
  let cells: (Side | null)[];

  if (text.includes('|')) {
    cells = [];
    for (const line of text.split(/\r?\n/)) {
      if (line.trim() === '' || /^[-+]+$/.test(line.trim())) continue;
      for (const cell of line.split('|')) {
        cells.push(cellFromChar(cell.trim()));
      }
    }
  } else {
    cells = Array.from(text.replace(/[\s/]/g, ''), cellFromChar);
  }

  if (cells.length !== CELL_COUNT) {
    throw new Error(`Expected ${CELL_COUNT} cells, found ${cells.length}`);
  }

  let board = newGame();
  cells.forEach((side, i) => {
    if (side) {
      board = placeMask(board, cellMask(Math.floor(i / BOARD_SIZE), i % BOARD_SIZE, side));
    }
  });
  return board;
}
