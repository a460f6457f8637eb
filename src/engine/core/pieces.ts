import { type PieceId, type PieceShape, createCellValue } from "./types";

// SRS shapes. Offsets are [dx, dy] inside the bounding box, y grows downward.
export const PIECES: Readonly<Record<PieceId, PieceShape>> = {
  I: {
    boxSize: 4,
    cells: {
      left: [
        [1, 0],
        [1, 1],
        [1, 2],
        [1, 3],
      ],
      right: [
        [2, 0],
        [2, 1],
        [2, 2],
        [2, 3],
      ],
      spawn: [
        [0, 1],
        [1, 1],
        [2, 1],
        [3, 1],
      ],
      two: [
        [0, 2],
        [1, 2],
        [2, 2],
        [3, 2],
      ],
    },
    id: "I",
    kickGroup: "I",
    value: createCellValue(1),
  },
  J: {
    boxSize: 3,
    cells: {
      left: [
        [1, 0],
        [1, 1],
        [0, 2],
        [1, 2],
      ],
      right: [
        [1, 0],
        [2, 0],
        [1, 1],
        [1, 2],
      ],
      spawn: [
        [0, 0],
        [0, 1],
        [1, 1],
        [2, 1],
      ],
      two: [
        [0, 1],
        [1, 1],
        [2, 1],
        [2, 2],
      ],
    },
    id: "J",
    kickGroup: "JLSTZ",
    value: createCellValue(6),
  },
  L: {
    boxSize: 3,
    cells: {
      left: [
        [0, 0],
        [1, 0],
        [1, 1],
        [1, 2],
      ],
      right: [
        [1, 0],
        [1, 1],
        [1, 2],
        [2, 2],
      ],
      spawn: [
        [2, 0],
        [0, 1],
        [1, 1],
        [2, 1],
      ],
      two: [
        [0, 1],
        [1, 1],
        [2, 1],
        [0, 2],
      ],
    },
    id: "L",
    kickGroup: "JLSTZ",
    value: createCellValue(7),
  },
  O: {
    boxSize: 4,
    cells: {
      left: [
        [1, 0],
        [2, 0],
        [1, 1],
        [2, 1],
      ],
      right: [
        [1, 0],
        [2, 0],
        [1, 1],
        [2, 1],
      ],
      spawn: [
        [1, 0],
        [2, 0],
        [1, 1],
        [2, 1],
      ],
      two: [
        [1, 0],
        [2, 0],
        [1, 1],
        [2, 1],
      ],
    },
    id: "O",
    kickGroup: "O",
    value: createCellValue(2),
  },
  S: {
    boxSize: 3,
    cells: {
      left: [
        [0, 0],
        [0, 1],
        [1, 1],
        [1, 2],
      ],
      right: [
        [1, 0],
        [1, 1],
        [2, 1],
        [2, 2],
      ],
      spawn: [
        [1, 0],
        [2, 0],
        [0, 1],
        [1, 1],
      ],
      two: [
        [1, 1],
        [2, 1],
        [0, 2],
        [1, 2],
      ],
    },
    id: "S",
    kickGroup: "JLSTZ",
    value: createCellValue(4),
  },
  T: {
    boxSize: 3,
    cells: {
      left: [
        [1, 0],
        [0, 1],
        [1, 1],
        [1, 2],
      ],
      right: [
        [1, 0],
        [1, 1],
        [2, 1],
        [1, 2],
      ],
      spawn: [
        [1, 0],
        [0, 1],
        [1, 1],
        [2, 1],
      ],
      two: [
        [0, 1],
        [1, 1],
        [2, 1],
        [1, 2],
      ],
    },
    id: "T",
    kickGroup: "JLSTZ",
    value: createCellValue(3),
  },
  Z: {
    boxSize: 3,
    cells: {
      left: [
        [1, 0],
        [0, 1],
        [1, 1],
        [0, 2],
      ],
      right: [
        [2, 0],
        [1, 1],
        [2, 1],
        [1, 2],
      ],
      spawn: [
        [0, 0],
        [1, 0],
        [1, 1],
        [2, 1],
      ],
      two: [
        [0, 1],
        [1, 1],
        [1, 2],
        [2, 2],
      ],
    },
    id: "Z",
    kickGroup: "JLSTZ",
    value: createCellValue(5),
  },
};

export const ALL_PIECES: ReadonlyArray<PieceId> = [
  "I",
  "O",
  "T",
  "S",
  "Z",
  "J",
  "L",
];
