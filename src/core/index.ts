// "Core" is the stable, deterministic rules and search surface (no I/O).

export type { Color, Corner, Region } from "../types.ts";
export type { GameState, NodeId, BoardState } from "../game/state.ts";
export type { Move, StepMove, JumpMove } from "../game/moveTypes.ts";
export type { Board } from "../game/board.ts";
export type { MovegenRules } from "../game/movegen.ts";
export type { VariantId, VariantSpec } from "../variants/variantTypes.ts";
export type { SearchOptions, SearchResult } from "../ai/search.ts";
export type { SeatConfig, GamePlayer, PlayerDecision, HumanInputSource } from "../ai/aiTypes.ts";
export type { GameConfig } from "../config.ts";
export type { GameStatus, ResumePoint, TurnRecord, TurnEvent } from "../controller/turnController.ts";

export { STAR_BOARD, createStarBoard } from "../game/board.ts";
export { createInitialGameState } from "../game/state.ts";
export { VARIANTS, getVariantById, variantForPlayerCount } from "../variants/variantRegistry.ts";
export { generateLegalMoves, generateMovesFrom, hasAnyLegalMove, DEFAULT_RULES } from "../game/movegen.ts";
export { applyMove, validateMove, passTurn } from "../game/applyMove.ts";
export { getWinner, hasWon, isStalemate } from "../game/gameOver.ts";
export { hashGameState } from "../game/hashState.ts";
export { formatMove, labelToNodeId, nodeIdToLabel } from "../game/coordFormat.ts";
export { evaluateState, evaluateMargin } from "../ai/evaluate.ts";
export { chooseGreedyMove, chooseSearchMove } from "../ai/search.ts";
export { createPlayer } from "../controller/players.ts";
export { TurnController } from "../controller/turnController.ts";
export { createGameConfig, loadGameConfig } from "../config.ts";
export { EngineError, isEngineError } from "../game/engineError.ts";
