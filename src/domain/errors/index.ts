export { DuplicatePickError } from "./DuplicatePickError.js";
export { GameCommandInputError } from "./GameCommandInputError.js";
export { GameNotFoundError } from "./GameNotFoundError.js";
export { InvalidGameStateError } from "./InvalidGameStateError.js";
export { InvalidRoundStateError } from "./InvalidRoundStateError.js";
export { RoundNotFoundError } from "./RoundNotFoundError.js";
