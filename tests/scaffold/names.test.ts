import { describe, it, expect } from '@jest/globals';
import {
  appConfigClassName,
  pythonTitle,
  suggestAlternative,
  validateAppName,
  validateAppNames,
} from '../../src/scaffold/names.js';
import { InvalidNameError, NameConflictError } from '../../src/core/errors.js';
import { DEFAULT_CONFIG } from '../../src/core/config.js';

const reserved = DEFAULT_CONFIG.reservedNames;

describe('application names', () => {
  it('title-cases every run of letters', () => {
    expect(pythonTitle('blog')).toBe('Blog');
    expect(pythonTitle('blog_posts')).toBe('Blog_Posts');
    expect(pythonTitle('v2api')).toBe('V2Api');
    expect(pythonTitle('BLOG')).toBe('Blog');
    expect(appConfigClassName('user_profile')).toBe('User_ProfileConfig');
  });

  it.each(['admin', 'ADMIN', 'Auth', 'contentTypes', 'sessionS', 'Messages', 'STATICFILES'])(
    'rejects the reserved name %s',
    (name) => {
      expect(() => validateAppName(name, reserved)).toThrow(NameConflictError);
    },
  );

  it('names the builtin and suggests an alternative', () => {
    let caught: unknown;
    try {
      validateAppName('Admin', reserved);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(NameConflictError);
    expect(caught).toMatchObject({ builtin: 'django.contrib.admin', suggestion: 'Admin_app' });
  });

  it('skips suggestions that are taken too', () => {
    expect(suggestAlternative('admin', { admin: 'x', admin_app: 'y' })).toBe('admin_app2');
  });

  it('rejects names that are not identifiers', () => {
    expect(() => validateAppName('2fast', reserved)).toThrow(InvalidNameError);
    expect(() => validateAppName('my-app', reserved)).toThrow(InvalidNameError);
    expect(() => validateAppName('', reserved)).toThrow(InvalidNameError);
  });

  it('accepts ordinary names, including object property names', () => {
    expect(() => validateAppNames(['blog', 'shop_2', '_internal', 'constructor'], reserved)).not.toThrow();
  });

  it('rejects duplicates', () => {
    expect(() => validateAppNames(['blog', 'blog'], reserved)).toThrow(
      'Application "blog" is listed more than once',
    );
  });
});
