export { GameNode } from './game-node.js';
export { GameTree } from './game-tree.js';
