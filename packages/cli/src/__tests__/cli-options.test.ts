/**
 * CLI options parsing tests
 */

import { CommanderError, type Command } from 'commander';
import { describe, it, expect } from 'vitest';

import { createProgram, parseCliOptions, VERSION } from '../cli.js';

describe('parseCliOptions', () => {
  describe('strategies', () => {
    it('should parse both sides', () => {
      const result = parseCliOptions({ white: 'engine', black: 'random' });
      expect(result.white).toBe('engine');
      expect(result.black).toBe('random');
    });

    it('should drop an unknown strategy', () => {
      expect(parseCliOptions({ white: 'minimax' }).white).toBeUndefined();
    });
  });

  describe('numeric options', () => {
    it('should keep numbers from the argument parser', () => {
      const result = parseCliOptions({ games: 3, moveTime: 250, pace: 0, maxPlies: 80 });
      expect(result.games).toBe(3);
      expect(result.moveTime).toBe(250);
      expect(result.pace).toBe(0);
      expect(result.maxPlies).toBe(80);
    });

    it('should accept numeric strings', () => {
      expect(parseCliOptions({ seed: '42' }).seed).toBe(42);
      expect(parseCliOptions({ simulations: '200' }).simulations).toBe(200);
    });

    it('should drop values that are not numbers', () => {
      expect(parseCliOptions({ games: 'three' }).games).toBeUndefined();
    });
  });

  describe('paths', () => {
    it('should parse engine, output and config paths', () => {
      const result = parseCliOptions({
        engine: '/usr/games/stockfish',
        outputDir: 'out',
        config: './my-config.json',
      });
      expect(result.engine).toBe('/usr/games/stockfish');
      expect(result.outputDir).toBe('out');
      expect(result.config).toBe('./my-config.json');
    });
  });

  describe('flags', () => {
    it('should translate negated commander flags', () => {
      const result = parseCliOptions({ board: false, color: false });
      expect(result.noBoard).toBe(true);
      expect(result.noColor).toBe(true);
    });

    it('should not set negations when the flags are absent', () => {
      const result = parseCliOptions({ board: true, color: true });
      expect(result.noBoard).toBeUndefined();
      expect(result.noColor).toBeUndefined();
    });

    it('should parse boolean switches', () => {
      const result = parseCliOptions({ showConfig: true, dryRun: true, verbose: true });
      expect(result.showConfig).toBe(true);
      expect(result.dryRun).toBe(true);
      expect(result.verbose).toBe(true);
    });
  });

  it('should return an empty object for no options', () => {
    expect(parseCliOptions({})).toEqual({});
  });
});

describe('createProgram', () => {
  function playCommandOf(program: Command): Command {
    const play = program.commands.find((command) => command.name() === 'play');
    if (!play) throw new Error('play command missing');
    return play
      .exitOverride()
      .configureOutput({ writeErr: () => undefined, writeOut: () => undefined });
  }

  it('should name the program and its version', () => {
    const program = createProgram();
    expect(program.name()).toBe('chessduel');
    expect(program.version()).toBe(VERSION);
  });

  it('should declare the play command options', () => {
    const play = playCommandOf(createProgram());
    const flags = play.options.map((option) => option.long);

    expect(flags).toContain('--white');
    expect(flags).toContain('--black');
    expect(flags).toContain('--engine');
    expect(flags).toContain('--move-time');
    expect(flags).toContain('--games');
    expect(flags).toContain('--output-dir');
    expect(flags).toContain('--no-board');
    expect(flags).toContain('--dry-run');
  });

  it('should reject a strategy outside the choices', () => {
    const play = playCommandOf(createProgram());

    expect(() => play.parse(['--white', 'bishop'], { from: 'user' })).toThrow(CommanderError);
  });

  it('should reject a non-integer game count', () => {
    const play = playCommandOf(createProgram());

    expect(() => play.parse(['--games', 'two'], { from: 'user' })).toThrow(CommanderError);
  });
});
