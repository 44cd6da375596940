/**
 * AB genome parser.
 *
 * Grammar: `("<" X "," Y "," SIZE ">")* ("|" ("<" X "," Y "," LEN ">")*)?`
 *
 * Rooms come from the tokens before the `|`, corridors from the ones after
 * it; output keeps token order, rooms first.
 */

import { ParseError } from "@arena/contracts";
import { CORRIDOR_WIDTH, createRoom, type Room } from "../rooms/types";

class GenomeScanner {
  private position = 0;

  constructor(private readonly source: string) {}

  get offset(): number {
    return this.position;
  }

  peek(): string | undefined {
    return this.source[this.position];
  }

  atEnd(): boolean {
    return this.position >= this.source.length;
  }

  expect(char: string): void {
    const found = this.peek();
    if (found !== char) {
      throw this.error(`"${char}"`, found);
    }
    this.position++;
  }

  /**
   * Read a run of digits, optionally preceded by a minus sign.
   */
  integer(signed: boolean): number {
    const start = this.position;
    if (signed && this.peek() === "-") {
      this.position++;
    }
    const digitsStart = this.position;
    while (isDigit(this.peek())) {
      this.position++;
    }
    if (this.position === digitsStart) {
      throw this.error("a digit", this.peek());
    }
    return Number.parseInt(this.source.slice(start, this.position), 10);
  }

  error(expected: string, found: string | undefined): ParseError {
    const shown = found === undefined ? "end of input" : `"${found}"`;
    return new ParseError(
      "GENOME_PARSE_FAILED",
      `Expected ${expected} at position ${this.position}, found ${shown}`,
      { position: this.position, expected, found: found ?? null },
    );
  }
}

function isDigit(char: string | undefined): boolean {
  return char !== undefined && char >= "0" && char <= "9";
}

function readTriple(
  scanner: GenomeScanner,
  signedLast: boolean,
): [number, number, number] {
  scanner.expect("<");
  const x = scanner.integer(false);
  scanner.expect(",");
  const y = scanner.integer(false);
  scanner.expect(",");
  const last = scanner.integer(signedLast);
  scanner.expect(">");
  return [x, y, last];
}

/**
 * Corridor rectangle for a signed length: positive runs along x with a
 * height of three tiles, zero or negative runs along y with a width of three.
 */
export function corridorFromLength(x: number, y: number, length: number): Room {
  if (length > 0) {
    return createRoom(x, y, x + length - 1, y + CORRIDOR_WIDTH - 1, true);
  }
  return createRoom(x, y, x + CORRIDOR_WIDTH - 1, y - length - 1, true);
}

/**
 * Decode a genome line into rooms and corridors.
 *
 * @throws ParseError when a token is malformed or the line has trailing text
 */
export function parseGenome(genome: string): Room[] {
  const source = genome.replace(/\s+$/, "");
  const scanner = new GenomeScanner(source);
  const rooms: Room[] = [];

  while (scanner.peek() === "<") {
    const [x, y, size] = readTriple(scanner, false);
    rooms.push(createRoom(x, y, x + size - 1, y + size - 1));
  }

  if (scanner.peek() === "|") {
    scanner.expect("|");
    while (scanner.peek() === "<") {
      const [x, y, length] = readTriple(scanner, true);
      rooms.push(corridorFromLength(x, y, length));
    }
  }

  if (!scanner.atEnd()) {
    throw scanner.error(`"<" or end of genome`, scanner.peek());
  }

  return rooms;
}
