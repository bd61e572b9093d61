import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CsvRecordSource } from './csv-record-source';
import { SourceReadError } from '../../domain/errors/provisioning-errors';
import { ProvisioningLogger } from '../../modules/logging/provisioning-logger.service';

const HEADER =
  'DisplayName,UserPrincipalName,Password,First Name,Last Name,Job title,Department,Usage location,State,Country,Office Location,City,Postal Code';

describe('CsvRecordSource', () => {
  let dir: string;
  let source: CsvRecordSource;

  const mockLogger = {
    debug: jest.fn(),
    warn: jest.fn(),
  };

  function writeCsv(name: string, content: string): string {
    const path = join(dir, name);
    writeFileSync(path, content, 'utf8');
    return path;
  }

  beforeEach(() => {
    jest.clearAllMocks();
    dir = mkdtempSync(join(tmpdir(), 'csv-record-source-'));
    source = new CsvRecordSource(mockLogger as unknown as ProvisioningLogger);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should map every column of the onboarding sheet', async () => {
    const path = writeCsv(
      'users.csv',
      `${HEADER}\nJane Doe,jdoe@contoso.com,test-password,Jane,Doe,Engineer,R&D,US,WA,United States,Building 7,Seattle,98101\n`,
    );

    await expect(source.parse(path)).resolves.toEqual([
      {
        rowNumber: 1,
        displayName: 'Jane Doe',
        userPrincipalName: 'jdoe@contoso.com',
        password: 'test-password',
        givenName: 'Jane',
        surname: 'Doe',
        jobTitle: 'Engineer',
        department: 'R&D',
        usageLocation: 'US',
        officeLocation: 'Building 7',
        city: 'Seattle',
        state: 'WA',
        country: 'United States',
        postalCode: '98101',
      },
    ]);
  });

  it('should keep file order and number the data rows', async () => {
    const path = writeCsv(
      'users.csv',
      'DisplayName,UserPrincipalName,Password\nA,a@contoso.com,p1\nB,b@contoso.com,p2\nC,c@contoso.com,p3\n',
    );

    const records = await source.parse(path);

    expect(records.map((r) => [r.rowNumber, r.displayName])).toEqual([
      [1, 'A'],
      [2, 'B'],
      [3, 'C'],
    ]);
  });

  it('should match headers case-insensitively, trim values and strip a BOM', async () => {
    const path = writeCsv(
      'users.csv',
      '\uFEFF displayname , USERPRINCIPALNAME,password,first name\n  Jane Doe , jdoe@contoso.com ,test-password, Jane \n',
    );

    const [record] = await source.parse(path);

    expect(record.displayName).toBe('Jane Doe');
    expect(record.userPrincipalName).toBe('jdoe@contoso.com');
    expect(record.givenName).toBe('Jane');
  });

  it('should read missing optional columns as empty strings', async () => {
    const path = writeCsv('users.csv', 'DisplayName,UserPrincipalName,Password\nJane Doe,jdoe@contoso.com,test-password\n');

    const [record] = await source.parse(path);

    expect(record.jobTitle).toBe('');
    expect(record.postalCode).toBe('');
  });

  it('should pass malformed values through untouched', async () => {
    const path = writeCsv('users.csv', 'DisplayName,UserPrincipalName,Password\nBad Row,not-an-upn,x\n');
    const [record] = await source.parse(path);
    expect(record.userPrincipalName).toBe('not-an-upn');
  });

  it('should handle quoted values with commas', async () => {
    const path = writeCsv(
      'users.csv',
      'DisplayName,UserPrincipalName,Password,Office Location\n"Doe, Jane",jdoe@contoso.com,test-password,"Floor 2, East"\n',
    );
    const [record] = await source.parse(path);
    expect(record.displayName).toBe('Doe, Jane');
    expect(record.officeLocation).toBe('Floor 2, East');
  });

  it('should skip blank lines', async () => {
    const path = writeCsv('users.csv', 'DisplayName,UserPrincipalName,Password\n\nA,a@contoso.com,p1\n  \n\nB,b@contoso.com,p2\n');
    await expect(source.parse(path)).resolves.toHaveLength(2);
  });

  it('should warn about unrecognised columns', async () => {
    const path = writeCsv('users.csv', 'DisplayName,UserPrincipalName,Password,Manager\nA,a@contoso.com,p1,Bob\n');
    await source.parse(path);
    expect(mockLogger.warn).toHaveBeenCalledWith('source', 'Ignoring unrecognised column(s): Manager');
  });

  it('should fail with SourceReadError when the file cannot be read', async () => {
    const path = join(dir, 'missing.csv');
    const err = await source.parse(path).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SourceReadError);
    expect((err as SourceReadError).message).toMatch(new RegExp(`^Cannot read input file ${path}: ENOENT`));
  });

  it('should fail when a required column is missing', async () => {
    const path = writeCsv('users.csv', 'DisplayName,First Name\nJane Doe,Jane\n');
    await expect(source.parse(path)).rejects.toThrow(
      new SourceReadError(`${path} is missing required column(s): UserPrincipalName, Password`),
    );
  });

  it('should fail when there are no data rows', async () => {
    const path = writeCsv('users.csv', `${HEADER}\n`);
    await expect(source.parse(path)).rejects.toThrow(new SourceReadError(`No user records found in ${path}`));
  });

  it('should fail on an unterminated quote', async () => {
    const path = writeCsv('users.csv', 'DisplayName,UserPrincipalName,Password\n"Jane Doe,jdoe@contoso.com,test-password\n');
    const err = await source.parse(path).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SourceReadError);
    expect((err as SourceReadError).message).toMatch(/^Malformed CSV in /);
  });
});
