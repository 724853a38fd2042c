import { readFile } from 'fs/promises';
import { z } from 'zod';
import { CredentialsError, errorMessage } from '../utils/errors';

const ServiceAccountKeySchema = z.object({
  type: z.literal('service_account').optional(),
  project_id: z.string().min(1).optional(),
  private_key_id: z.string().optional(),
  private_key: z.string().min(1),
  client_email: z.string().email(),
  token_uri: z.string().url().optional()
});

export type ServiceAccountKey = z.infer<typeof ServiceAccountKeySchema>;

export async function loadServiceAccountKey(path: string): Promise<ServiceAccountKey> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (err) {
    throw new CredentialsError(`Cannot read credentials file ${path}: ${errorMessage(err)}`, { cause: err });
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new CredentialsError(`Credentials file ${path} is not valid JSON`, { cause: err });
  }
  const parsed = ServiceAccountKeySchema.safeParse(json);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join('.') || '(root)');
    throw new CredentialsError(`Credentials file ${path} is missing or has invalid fields: ${fields.join(', ')}`);
  }
  return parsed.data;
}
