import { Command } from 'commander';
import { CredentialStore, ValidationError, resolveCredentialsPath } from '@davgate/shared';
import { wrapCommand } from '../utils/errorHandler.js';

export interface UsersCommandOptions {
  configDir?: string;
}

async function openStore(options: UsersCommandOptions): Promise<CredentialStore> {
  const store = new CredentialStore(resolveCredentialsPath(options.configDir));
  await store.initialize();
  return store;
}

/**
 * Usernames travel in Basic auth as `user:password`, so they cannot contain `:`.
 */
export function validateUsername(username: string): void {
  if (!username) {
    throw ValidationError.required('username');
  }
  if (username.includes(':')) {
    throw new ValidationError('Username must not contain ":"', 'username');
  }
}

export async function addUser(username: string, password: string, options: UsersCommandOptions = {}): Promise<void> {
  validateUsername(username);
  if (!password) {
    throw ValidationError.required('password');
  }

  const store = await openStore(options);
  await store.add(username, password);
  await store.save();

  console.log(`User ${username} created successfully.`);
}

export async function removeUser(username: string, options: UsersCommandOptions = {}): Promise<void> {
  const store = await openStore(options);
  await store.delete(username);
  await store.save();

  console.log(`User ${username} removed (if existed).`);
}

export async function listUsers(options: UsersCommandOptions = {}): Promise<void> {
  const store = await openStore(options);
  const usernames = (await store.list()).sort();

  if (usernames.length === 0) {
    console.log('No users found.');
    return;
  }

  console.log('Users:');
  for (const username of usernames) {
    console.log(`- ${username}`);
  }
}

export const usersCommand = new Command('users')
  .description('Manage the users allowed to connect')
  .option('-c, --config-dir <dir>', 'Directory holding users.json (default: DAVGATE_CONFIG_DIR or .)');

usersCommand
  .command('add <username> <password>')
  .description('Add a new user')
  .action(
    wrapCommand('adding user', async (username: string, password: string) => {
      await addUser(username, password, usersCommand.opts<UsersCommandOptions>());
    })
  );

usersCommand
  .command('remove <username>')
  .alias('rm')
  .description('Remove a user')
  .action(
    wrapCommand('removing user', async (username: string) => {
      await removeUser(username, usersCommand.opts<UsersCommandOptions>());
    })
  );

usersCommand
  .command('list')
  .alias('ls')
  .description('List all users')
  .action(
    wrapCommand('listing users', async () => {
      await listUsers(usersCommand.opts<UsersCommandOptions>());
    })
  );
