import { join } from 'path';
import { tmpdir } from 'os';
import { loadServiceAccountKey } from '../services/credentials';
import { CredentialsError } from '../utils/errors';
import { TEST_KEY, writeCredentialsFile } from './fakes';

describe('loadServiceAccountKey', () => {
  it('reads a service account key', async () => {
    const path = writeCredentialsFile();
    await expect(loadServiceAccountKey(path)).resolves.toEqual(TEST_KEY);
  });

  it('fails on a missing file', async () => {
    const path = join(tmpdir(), 'does-not-exist', 'credentials.json');
    const result = loadServiceAccountKey(path);
    await expect(result).rejects.toBeInstanceOf(CredentialsError);
    await expect(result).rejects.toThrow(`Cannot read credentials file ${path}`);
  });

  it('fails on invalid JSON', async () => {
    const path = writeCredentialsFile('{"client_email":');
    await expect(loadServiceAccountKey(path)).rejects.toThrow(`Credentials file ${path} is not valid JSON`);
  });

  it('names the fields that are wrong', async () => {
    const path = writeCredentialsFile({ client_email: 'indexer@test-project.iam.gserviceaccount.com' });
    await expect(loadServiceAccountKey(path)).rejects.toThrow(
      `Credentials file ${path} is missing or has invalid fields: private_key`
    );
  });
});
