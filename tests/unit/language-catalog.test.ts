import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { LanguageCatalog } from '../../src/config/language-catalog';

describe('LanguageCatalog', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'languages-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeCatalog(content: string): string {
    const file = path.join(dir, 'languages.yaml');
    fs.writeFileSync(file, content);
    return file;
  }

  it('should load the bundled catalog', () => {
    const catalog = new LanguageCatalog();
    expect(catalog.list().map((l) => l.code)).toEqual(['en', 'es', 'fr', 'de']);
    expect(catalog.has('EN')).toBe(true);
  });

  it('should normalize codes and skip malformed entries', () => {
    const file = writeCatalog(
      ['- code: PT-BR', '  label: Português', '- code: not a code', '- label: missing code', '- code: ja'].join('\n'),
    );
    const catalog = new LanguageCatalog(file);

    expect(catalog.list()).toEqual([
      { code: 'pt-br', label: 'Português' },
      { code: 'ja', label: 'JA' },
    ]);
  });

  it('should fall back to the built-in list when the file is missing', () => {
    const catalog = new LanguageCatalog(path.join(dir, 'absent.yaml'));
    expect(catalog.list()).toEqual(LanguageCatalog.builtInDefault());
  });

  it('should fall back to the built-in list when the file is not a list', () => {
    const catalog = new LanguageCatalog(writeCatalog('en: English\n'));
    expect(catalog.list()).toEqual(LanguageCatalog.builtInDefault());
  });

  it('should label unknown codes by their uppercase form', () => {
    const catalog = new LanguageCatalog(writeCatalog('- code: en\n  label: English\n'));
    expect(catalog.label('en')).toBe('English');
    expect(catalog.label('sv')).toBe('SV');
  });

  it('should pick up edits on reload', () => {
    const file = writeCatalog('- code: en\n');
    const catalog = new LanguageCatalog(file);
    fs.writeFileSync(file, '- code: en\n- code: it\n');

    catalog.loadAll();

    expect(catalog.list().map((l) => l.code)).toEqual(['en', 'it']);
  });
});
