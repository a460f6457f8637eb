import type { GameOverReason, PieceId, SpinKind, Tick, TopOutReason } from "./types";

export type DomainEvent =
  | { kind: "PieceSpawned"; pieceId: PieceId; tick: Tick }
  | { kind: "MovedLeft"; fromX: number; toX: number; tick: Tick }
  | { kind: "MovedRight"; fromX: number; toX: number; tick: Tick }
  | {
      kind: "Rotated";
      dir: "CW" | "CCW";
      kick: "none" | "wall" | "floor";
      kickIndex: number;
      tick: Tick;
    }
  | { kind: "SoftDropToggled"; on: boolean; tick: Tick }
  | { kind: "LockStarted"; tick: Tick }
  | { kind: "LockReset"; reason: "move" | "rotate"; resets: number; tick: Tick }
  | {
      kind: "Locked";
      source: "ground" | "hardDrop";
      pieceId: PieceId;
      spin: SpinKind;
      tick: Tick;
    }
  | {
      kind: "LinesCleared";
      rows: ReadonlyArray<number>;
      spin: SpinKind;
      tetris: boolean;
      points: number;
      tick: Tick;
    }
  | { kind: "LevelUp"; level: number; tick: Tick }
  | { kind: "Held"; swapped: boolean; pieceId: PieceId; tick: Tick }
  | { kind: "Paused"; tick: Tick }
  | { kind: "Resumed"; tick: Tick }
  | { kind: "TopOut"; reason: TopOutReason; tick: Tick }
  | { kind: "Victory"; level: number; tick: Tick }
  | { kind: "GameOver"; reason: GameOverReason; tick: Tick };
