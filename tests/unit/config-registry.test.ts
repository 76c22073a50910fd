/**
 * Settings Registry Unit Tests
 *
 * Tests for the registry of setting descriptors:
 * - Registration, ordering and freezing
 * - Definition shape checks
 * - Documentation normalization and reference output
 * - The core settings catalog
 */

import { describe, it, expect } from 'vitest';
import {
  coreSettings,
  createCoreRegistry,
  defineSetting,
  describeSettings,
  formatValue,
  normalizeDoc,
  SettingsRegistry,
  ValueHolder,
} from '../../src/config/registry/index.js';
import { dedent } from '../../src/config/registry/schema-builder.js';
import { validateBool, validatePosInt, validateString } from '../../src/config/registry/validators.js';
import {
  DuplicateSettingError,
  ErrorCodes,
  RegistryFrozenError,
  SettingsError,
  ValidationError,
} from '../../src/core/errors.js';

function graceSetting() {
  return defineSetting({
    name: 'graceful_timeout',
    section: 'Worker Processes',
    cli: ['--graceful-timeout'],
    meta: 'INT',
    validator: validatePosInt,
    type: 'int',
    default: 30,
    desc: `
      Timeout for graceful workers restart.

      Workers still alive after this many seconds are force killed.
    `,
  });
}

// =============================================================================
// REGISTRATION
// =============================================================================

describe('SettingsRegistry', () => {
  describe('register', () => {
    it('should assign orders from the registry size', () => {
      const registry = new SettingsRegistry();
      const first = registry.register(graceSetting());
      const second = registry.register(
        defineSetting({
          name: 'reload',
          section: 'Debugging',
          cli: ['--reload'],
          action: 'store_true',
          validator: validateBool,
          default: false,
          desc: 'Restart workers when code changes.',
        })
      );

      expect(first.order).toBe(0);
      expect(second.order).toBe(1);
      expect(registry.size).toBe(2);
    });

    it('should normalize the definition into a frozen descriptor', () => {
      const registry = new SettingsRegistry();
      const descriptor = registry.register(graceSetting());

      expect(descriptor.name).toBe('graceful_timeout');
      expect(descriptor.shortDoc).toBe('Timeout for graceful workers restart.');
      expect(descriptor.longDoc).toBe(
        'Timeout for graceful workers restart.\n\nWorkers still alive after this many seconds are force killed.'
      );
      expect(descriptor.action).toBe('store');
      expect(descriptor.type).toBe('int');
      expect(Object.isFrozen(descriptor)).toBe(true);
      expect(Object.isFrozen(descriptor.cli)).toBe(true);
    });

    it('should fill in action, type and flags when omitted', () => {
      const registry = new SettingsRegistry();
      const descriptor = registry.register(
        defineSetting({
          name: 'chdir',
          section: 'Server Mechanics',
          validator: validateString,
          default: undefined,
          desc: 'Change directory before loading apps.',
        })
      );

      expect(descriptor.action).toBe('store');
      expect(descriptor.type).toBe('string');
      expect(descriptor.cli).toEqual([]);
      expect(descriptor.meta).toBeUndefined();
    });

    it('should reject a second setting with the same name', () => {
      const registry = new SettingsRegistry();
      registry.register(graceSetting());

      expect(() => registry.register(graceSetting())).toThrow(DuplicateSettingError);
      expect(() => registry.register(graceSetting())).toThrow(
        'Setting already registered: graceful_timeout'
      );
      expect(registry.size).toBe(1);
    });

    it('should reject malformed definitions', () => {
      const registry = new SettingsRegistry();
      const definition = defineSetting({
        name: 'Bad-Name',
        section: 'Testing',
        validator: validateString,
        default: undefined,
        desc: 'Broken.',
      });

      try {
        registry.register(definition);
        expect.fail('expected a definition error');
      } catch (error) {
        expect(error).toBeInstanceOf(SettingsError);
        if (error instanceof SettingsError) {
          expect(error.code).toBe(ErrorCodes.INVALID_DEFINITION);
          expect(error.message).toBe(
            "Invalid definition for setting 'Bad-Name':\n  - name: Name must be snake_case"
          );
        }
      }
      expect(registry.size).toBe(0);
    });

    it('should reject malformed CLI flags', () => {
      const registry = new SettingsRegistry();
      const definition = defineSetting({
        name: 'chdir',
        section: 'Server Mechanics',
        cli: ['chdir'],
        validator: validateString,
        default: undefined,
        desc: 'Change directory.',
      });

      expect(() => registry.register(definition)).toThrow(
        'cli.0: Flag must look like -x or --long-name'
      );
    });
  });

  describe('freeze', () => {
    it('should refuse registrations once frozen', () => {
      const registry = new SettingsRegistry();
      registry.freeze();

      expect(registry.isFrozen).toBe(true);
      expect(() => registry.register(graceSetting())).toThrow(RegistryFrozenError);
    });
  });

  describe('lookup', () => {
    it('should find descriptors by name and list them in order', () => {
      const registry = createCoreRegistry();

      expect(registry.has('bind')).toBe(true);
      expect(registry.has('nope')).toBe(false);
      expect(registry.get('bind')?.section).toBe('Server Socket');
      expect(registry.get('nope')).toBeUndefined();
      expect(registry.all().map((d) => d.name).slice(0, 3)).toEqual(['config', 'bind', 'backlog']);
    });

    it('should return a copy from all()', () => {
      const registry = createCoreRegistry();

      expect(registry.all()).not.toBe(registry.all());
      expect(registry.all()).toHaveLength(30);
    });
  });

  describe('makeSettings', () => {
    it('should build one holder per setting with its default applied', () => {
      const registry = createCoreRegistry();
      const settings = registry.makeSettings();

      expect(settings.size).toBe(30);
      expect(settings.get('workers')?.get()).toBe(1);
      expect(settings.get('bind')?.get()).toBe('127.0.0.1:8000');
    });

    it('should leave out ignored settings', () => {
      const settings = createCoreRegistry().makeSettings(['spew', 'daemon']);

      expect(settings.size).toBe(28);
      expect(settings.has('spew')).toBe(false);
      expect(settings.has('daemon')).toBe(false);
    });

    it('should return independent holders on every call', () => {
      const registry = createCoreRegistry();
      const a = registry.makeSettings();
      const b = registry.makeSettings();

      a.get('workers')?.set('8');
      expect(a.get('workers')?.get()).toBe(8);
      expect(b.get('workers')?.get()).toBe(1);
    });

    it('should fail when a default does not validate', () => {
      const registry = new SettingsRegistry();
      registry.register(
        defineSetting({
          name: 'bad_default',
          section: 'Testing',
          validator: validatePosInt,
          type: 'int',
          default: -1,
          desc: 'Broken default.',
        })
      );

      expect(() => registry.makeSettings()).toThrow(
        "Invalid value for setting 'bad_default': Value must be positive: -1"
      );
    });
  });
});

// =============================================================================
// VALUE HOLDER
// =============================================================================

describe('ValueHolder', () => {
  it('should keep the current value when validation fails', () => {
    const registry = new SettingsRegistry();
    const holder = new ValueHolder(registry.register(graceSetting()));

    holder.set('0x10');
    expect(holder.get()).toBe(16);
    expect(() => holder.set('soon')).toThrow(ValidationError);
    expect(holder.get()).toBe(16);
  });

  it('should attribute validation errors to the setting', () => {
    const registry = new SettingsRegistry();
    const holder = new ValueHolder(registry.register(graceSetting()));

    try {
      holder.set('soon');
      expect.fail('expected a ValidationError');
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.setting).toBe('graceful_timeout');
        expect(error.reason).toBe('Invalid integer: soon');
        expect(error.cause).toBeInstanceOf(ValidationError);
      }
    }
  });

  it('should not run the validator over an absent default', () => {
    const registry = new SettingsRegistry();
    const holder = new ValueHolder(
      registry.register(
        defineSetting({
          name: 'pidfile',
          section: 'Server Mechanics',
          validator: validateString,
          default: undefined,
          desc: 'A filename to use for the PID file.',
        })
      )
    );

    expect(holder.name).toBe('pidfile');
    expect(holder.get()).toBeUndefined();
  });
});

// =============================================================================
// DOCUMENTATION
// =============================================================================

describe('documentation helpers', () => {
  describe('dedent', () => {
    it('should strip the common indentation', () => {
      expect(dedent('    a\n      b\n    c')).toBe('a\n  b\nc');
    });

    it('should ignore blank lines when measuring indentation', () => {
      expect(dedent('  a\n\n  b')).toBe('a\n\nb');
      expect(dedent('  a\n \n  b')).toBe('a\n\nb');
    });

    it('should leave unindented text alone', () => {
      expect(dedent('a\n  b')).toBe('a\n  b');
    });
  });

  describe('normalizeDoc', () => {
    it('should split a description into short and long docs', () => {
      const doc = normalizeDoc('\n      First line.\n\n      More text\n        indented.\n    ');

      expect(doc.shortDoc).toBe('First line.');
      expect(doc.longDoc).toBe('First line.\n\nMore text\n  indented.');
    });

    it('should use a single line as both docs', () => {
      expect(normalizeDoc('Just this.')).toEqual({ shortDoc: 'Just this.', longDoc: 'Just this.' });
    });
  });

  describe('formatValue', () => {
    it('should render absent values as none', () => {
      expect(formatValue(undefined)).toBe('none');
      expect(formatValue(null)).toBe('none');
    });

    it('should render functions by name', () => {
      function onReady(_server: unknown): void {}
      expect(formatValue(onReady)).toBe('[function onReady]');
    });

    it('should render other values as text', () => {
      expect(formatValue(2048)).toBe('2048');
      expect(formatValue(false)).toBe('false');
      expect(formatValue('-')).toBe('-');
    });
  });

  describe('describeSettings', () => {
    it('should produce one row per setting', () => {
      const registry = createCoreRegistry();
      const rows = describeSettings(registry.all());

      expect(rows).toHaveLength(30);
      expect(rows[1]).toEqual({
        name: 'bind',
        section: 'Server Socket',
        flags: '-b, --bind',
        type: 'string',
        default: '127.0.0.1:8000',
        description: 'The socket to bind.',
      });
    });

    it('should describe hooks and flagless settings', () => {
      const rows = describeSettings(createCoreRegistry().all());
      const whenReady = rows.find((row) => row.name === 'when_ready');
      const defaultProcName = rows.find((row) => row.name === 'default_proc_name');

      expect(whenReady?.flags).toBe('');
      expect(whenReady?.type).toBe('callable');
      expect(whenReady?.default).toBe('[function defaultWhenReady]');
      expect(defaultProcName?.default).toBe('gunicorn');
    });
  });
});

// =============================================================================
// CORE SETTINGS
// =============================================================================

describe('core settings', () => {
  it('should register every core setting with contiguous orders', () => {
    const registry = createCoreRegistry();
    const orders = registry.all().map((d) => d.order);

    expect(registry.size).toBe(coreSettings.length);
    expect(registry.size).toBe(30);
    expect(orders).toEqual(Array.from({ length: 30 }, (_, i) => i));
  });

  it('should keep registration order', () => {
    const names = createCoreRegistry()
      .all()
      .map((d) => d.name);

    expect(names[0]).toBe('config');
    expect(names.indexOf('workers')).toBeLessThan(names.indexOf('worker_class'));
    expect(names[names.length - 1]).toBe('worker_exit');
  });

  it('should document every setting', () => {
    for (const descriptor of createCoreRegistry().all()) {
      expect(descriptor.shortDoc.length).toBeGreaterThan(0);
      expect(descriptor.longDoc.startsWith(descriptor.shortDoc)).toBe(true);
    }
  });

  it('should give the documented short docs', () => {
    const registry = createCoreRegistry();

    expect(registry.get('workers')?.shortDoc).toBe(
      'The number of worker processes for handling requests.'
    );
    expect(registry.get('debug')?.shortDoc).toBe('Turn on debugging in the server.');
    expect(registry.get('config')?.shortDoc).toBe('The path to a config file.');
  });

  it('should mark switches as store_true', () => {
    const registry = createCoreRegistry();
    const switches = registry
      .all()
      .filter((d) => d.action === 'store_true')
      .map((d) => d.name);

    expect(switches).toEqual(['debug', 'spew', 'preload_app', 'daemon']);
  });
});
