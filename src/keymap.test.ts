import { describe, expect, it } from 'vitest';
import { Commands } from './command.js';
import { commandForKey, displayKey, isActionable, KEY_BINDINGS } from './keymap.js';

describe('keymap', () => {
  describe('commandForKey', () => {
    it('should map vim keys and arrows to the same commands', () => {
      expect(commandForKey('j')).toBe(Commands.down);
      expect(commandForKey('DOWN')).toBe(Commands.down);
      expect(commandForKey('k')).toBe(Commands.up);
      expect(commandForKey('UP')).toBe(Commands.up);
    });

    it('should map panel, playback and list keys', () => {
      expect(commandForKey('TAB')).toBe(Commands.nextPanel);
      expect(commandForKey('SHIFT_TAB')).toBe(Commands.prevPanel);
      expect(commandForKey(' ')).toBe(Commands.togglePlay);
      expect(commandForKey('ENTER')).toBe(Commands.play);
      expect(commandForKey('ESCAPE')).toBe(Commands.esc);
      expect(commandForKey('g')).toBe(Commands.gotoTop);
      expect(commandForKey('G')).toBe(Commands.gotoBottom);
    });

    it('should map screen keys', () => {
      expect(commandForKey('1')).toEqual({ type: 'goto-screen', screen: 'main' });
      expect(commandForKey('0')).toEqual({ type: 'goto-screen', screen: 'help' });
      expect(commandForKey('F1')).toEqual({ type: 'goto-screen', screen: 'help' });
    });

    it('should map quit and command entry', () => {
      expect(commandForKey('q')).toBe(Commands.quit);
      expect(commandForKey(':')).toBe(Commands.enterCommand);
    });

    it('should map unbound keys to nop', () => {
      expect(commandForKey('z')).toBe(Commands.nop);
      expect(commandForKey('CTRL_C')).toBe(Commands.nop);
      expect(commandForKey('J')).toBe(Commands.nop);
    });
  });

  describe('isActionable', () => {
    it('should accept presses and repeats only', () => {
      expect(isActionable({ name: 'j', kind: 'press' })).toBe(true);
      expect(isActionable({ name: 'j', kind: 'repeat' })).toBe(true);
      expect(isActionable({ name: 'j', kind: 'release' })).toBe(false);
    });
  });

  describe('KEY_BINDINGS', () => {
    it('should bind each key at most once', () => {
      const keys = KEY_BINDINGS.flatMap((binding) => binding.keys);
      expect(new Set(keys).size).toBe(keys.length);
    });
  });

  describe('displayKey', () => {
    it('should name special keys for the help screen', () => {
      expect(displayKey(' ')).toBe('Space');
      expect(displayKey('SHIFT_TAB')).toBe('S-Tab');
      expect(displayKey('DOWN')).toBe('↓');
      expect(displayKey('j')).toBe('j');
    });
  });
});
