import { describe, it, expect } from '@jest/globals';
import { loadManifest, parseManifest } from '../../src/scaffold/manifest.js';
import { DEFAULT_CONFIG } from '../../src/core/config.js';
import { TemplateError } from '../../src/core/errors.js';

describe('template manifest', () => {
  it('loads the bundled manifest', async () => {
    const manifest = await loadManifest(DEFAULT_CONFIG.templatesDir);

    expect(manifest.project.files).toHaveLength(23);
    expect(manifest.app.files).toHaveLength(34);
    expect(manifest.project.files.find((file) => file.path === 'manage.py')).toEqual({
      path: 'manage.py',
      template: 'project/manage.py.tpl',
      executable: true,
    });
  });

  it('defaults executable to false', () => {
    const manifest = parseManifest({
      project: { directories: [], files: [{ path: 'a.py', template: 'a.tpl' }] },
      app: { directories: ['apps/<<appName>>'], files: [] },
    });

    expect(manifest.project.files[0].executable).toBe(false);
    expect(manifest.app.directories).toEqual(['apps/<<appName>>']);
  });

  it('rejects malformed manifests', () => {
    expect(() => parseManifest([])).toThrow(TemplateError);
    expect(() => parseManifest({ project: { directories: [], files: [] } })).toThrow(
      'manifest section "app" is missing',
    );
    expect(() =>
      parseManifest({
        project: { directories: [], files: [{ path: 'a.py' }] },
        app: { directories: [], files: [] },
      }),
    ).toThrow('manifest section "project": each file needs a "path" and a "template"');
    expect(() =>
      parseManifest({
        project: { directories: [1], files: [] },
        app: { directories: [], files: [] },
      }),
    ).toThrow('manifest section "project": "directories" must be a list of paths');
  });
});
