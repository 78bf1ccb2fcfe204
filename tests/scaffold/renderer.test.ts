import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import * as fs from 'fs/promises';
import * as path from 'path';
import { TemplateRenderer, appTemplateVars, templateDirsBlock } from '../../src/scaffold/renderer.js';
import {
  expectedAppFiles,
  expectedProjectFiles,
  listFiles,
  makeTempDir,
  quietLogger,
  removeDir,
  silenceConsole,
  testConfig,
} from '../helpers.js';

function contentOf(files: { relativePath: string; content: string }[], relativePath: string): string {
  const file = files.find((entry) => entry.relativePath === relativePath);
  if (!file) {
    throw new Error(`${relativePath} is not planned`);
  }
  return file.content;
}

describe('TemplateRenderer', () => {
  let tempDir: string;
  let renderer: TemplateRenderer;

  beforeEach(async () => {
    silenceConsole();
    tempDir = await makeTempDir('dj-scaffold-render-');
    renderer = new TemplateRenderer(testConfig(), quietLogger());
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await removeDir(tempDir);
  });

  it('lists template directories for each application', () => {
    expect(templateDirsBlock(['main', 'blog'])).toBe(
      [
        "            BASE_DIR / 'templates',",
        "            BASE_DIR / 'apps' / 'main' / 'templates',",
        "            BASE_DIR / 'apps' / 'blog' / 'templates',",
      ].join('\n'),
    );
  });

  it('derives application variables', () => {
    expect(appTemplateVars('blog_posts', 'site', 'main')).toEqual({
      appName: 'blog_posts',
      appTitle: 'Blog_Posts',
      appConfigClass: 'Blog_PostsConfig',
      projectName: 'site',
      indexTitle: 'Blog_Posts module',
    });
    expect(appTemplateVars('main', 'site', 'main').indexTitle).toBe('Welcome to site');
  });

  it('registers the initial applications in the project plan', async () => {
    const plan = await renderer.planProject('site', ['main', 'blog']);

    const settings = contentOf(plan.files, 'config/settings/base.py');
    expect(settings).toContain(
      "    'rest_framework',\n    'main.apps.MainConfig',\n    'blog.apps.BlogConfig',\n]",
    );
    expect(settings).toContain("            BASE_DIR / 'apps' / 'blog' / 'templates',\n        ],");
    expect(settings).toContain('File: config/settings/base.py');

    const urls = contentOf(plan.files, 'config/urls.py');
    expect(urls).toContain(
      "    path('admin/', admin.site.urls),\n    path('', include('main.urls')),  # root application\n    path('blog/', include('blog.urls')),\n]",
    );
  });

  it('resolves every placeholder', async () => {
    const project = await renderer.planProject('site', ['main']);
    const app = await renderer.planApp('blog', 'site');

    for (const file of [...project.files, ...app.files]) {
      expect(file.content).not.toMatch(/<<\s*\w+\s*>>/);
    }
  });

  it('renders application files with the application names', async () => {
    const plan = await renderer.planApp('blog', 'site');

    expect(plan.files.map((file) => file.relativePath).sort()).toEqual(expectedAppFiles('blog').sort());
    expect(plan.directories).toContain('apps/blog/static/blog/images');

    const appsPy = contentOf(plan.files, 'apps/blog/apps.py');
    expect(appsPy).toContain('File: apps/blog/apps.py');
    expect(appsPy).toContain('class BlogConfig(AppConfig):');
    expect(appsPy).toContain("    name = 'blog'");
    expect(contentOf(plan.files, 'apps/blog/views.py')).toContain("'title': 'Blog module',");
    expect(contentOf(plan.files, 'apps/blog/exceptions.py')).toContain('class BlogError(Exception):');
  });

  it('writes a plan without overwriting existing files', async () => {
    const root = path.join(tempDir, 'site');
    const plan = await renderer.planProject('site', ['main']);

    const first = await renderer.writePlan(root, plan);
    expect(first.created).toHaveLength(23);
    expect(first.skipped).toEqual([]);
    expect(await listFiles(root)).toEqual(expectedProjectFiles().sort());
    expect((await fs.stat(path.join(root, 'manage.py'))).mode & 0o777).toBe(0o755);
    expect((await fs.stat(path.join(root, 'media', 'uploads'))).isDirectory()).toBe(true);

    await fs.writeFile(path.join(root, 'README.md'), 'my own readme\n', 'utf-8');
    const second = await renderer.writePlan(root, plan);

    expect(second.created).toEqual([]);
    expect(second.skipped).toHaveLength(23);
    expect(await fs.readFile(path.join(root, 'README.md'), 'utf-8')).toBe('my own readme\n');
  });

  it('renders the development guide', async () => {
    const guide = await renderer.renderDevelopmentGuide();
    expect(guide.startsWith('# Application development guide\n')).toBe(true);
  });
});
