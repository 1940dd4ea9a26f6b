export { NotationReconstructor } from './reconstructor.js';
export {
  GameSaver,
  formatGameFileName,
  DEFAULT_GAMES_DIRECTORY,
  type GameSaverOptions,
} from './game-saver.js';
