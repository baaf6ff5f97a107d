import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { UniquePathAllocator, nameFor, sanitizeFilename } from '../filenames';

describe('sanitizeFilename', () => {
  it('should replace characters that filesystems reject', () => {
    expect(sanitizeFilename('a:b/c*d')).toBe('a_b_c_d');
    expect(sanitizeFilename('a<b>c?"d|e\\f')).toBe('a_b_c__d_e_f');
  });

  it('should collapse whitespace and trim', () => {
    expect(sanitizeFilename('  my   file\tname .pdf ')).toBe('my file name .pdf');
  });

  it('should fall back to a default name when nothing is left', () => {
    expect(sanitizeFilename('')).toBe('document.pdf');
    expect(sanitizeFilename(' \t ')).toBe('document.pdf');
  });
});

describe('nameFor', () => {
  it('should prefix the signer emails', () => {
    expect(nameFor(['user@example.com'], 'contract.pdf')).toBe('user@example.com_contract.pdf');
    expect(nameFor(['a@x.com', 'b@y.com'], 'nda.pdf')).toBe('a@x.com+b@y.com_nda.pdf');
  });

  it('should keep the original name when no email is known', () => {
    expect(nameFor([], 'scan.PDF')).toBe('scan.PDF');
  });

  it('should add a pdf extension when the name has none', () => {
    expect(nameFor([], 'report')).toBe('report.pdf');
    expect(nameFor([], 'x/y')).toBe('x_y.pdf');
  });
});

describe('UniquePathAllocator', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'signaturit-names-'));
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('should step past files already on disk and names already handed out', async () => {
    await fs.writeFile(path.join(dir, 'report.pdf'), 'existing');
    const paths = new UniquePathAllocator();

    expect(await paths.uniquePathIn(dir, 'report.pdf')).toBe(path.join(dir, 'report_2.pdf'));
    expect(await paths.uniquePathIn(dir, 'report.pdf')).toBe(path.join(dir, 'report_3.pdf'));
  });

  it('should return the name itself when it is free', async () => {
    const paths = new UniquePathAllocator();

    expect(await paths.uniquePathIn(dir, 'report.pdf')).toBe(path.join(dir, 'report.pdf'));
    expect(await paths.uniquePathIn(dir, 'README')).toBe(path.join(dir, 'README'));
    expect(await paths.uniquePathIn(dir, 'README')).toBe(path.join(dir, 'README_2'));
  });

  it('should never hand out reserved paths', async () => {
    const paths = new UniquePathAllocator([path.join(dir, 'download_log.csv'), path.join(dir, '_no_email_samples')]);

    expect(await paths.uniquePathIn(dir, 'download_log.csv')).toBe(path.join(dir, 'download_log_2.csv'));
    expect(await paths.uniquePathIn(dir, '_no_email_samples')).toBe(path.join(dir, '_no_email_samples_2'));
  });
});
