/**
 * Inspect or change runtime preferences
 *
 * Usage:
 *   npx tsx scripts/preferences.ts list
 *   npx tsx scripts/preferences.ts get PERSONA_FINANCE_ENABLED
 *   npx tsx scripts/preferences.ts set SOURCE_REDDIT_ENABLED false
 *   npx tsx scripts/preferences.ts recipients list
 *   npx tsx scripts/preferences.ts recipients add someone@example.com
 *   npx tsx scripts/preferences.ts recipients remove someone@example.com
 */

import * as dotenv from 'dotenv';
import * as path from 'path';

dotenv.config({ path: path.resolve(process.cwd(), '.env.local') });
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

import { getSettings } from '@/src/config/settings';
import { PREFERENCE_DEFAULT, PREFERENCE_KEYS, parsePreferenceValue } from '@/src/config/preferences';
import { closeDbClient } from '@/src/lib/db/driver';
import { createDatabaseStore } from '@/src/lib/db/store';
import { addCustomRecipient, getCustomRecipients, removeCustomRecipient } from '@/src/lib/delivery/email';
import { logger } from '@/src/lib/logger';

const KNOWN_KEYS: string[] = Object.values(PREFERENCE_KEYS);

function usage(): never {
  console.error(
    'Usage: preferences.ts list | get <KEY> | set <KEY> <true|false> | recipients list | recipients add|remove <EMAIL>'
  );
  process.exit(1);
}

async function main() {
  const [command, key, value] = process.argv.slice(2);

  try {
    const store = await createDatabaseStore(getSettings());

    switch (command) {
      case 'list': {
        const stored = new Map((await store.listPreferences()).map((p) => [p.key, p.value]));
        for (const name of KNOWN_KEYS) {
          const current = stored.get(name);
          console.log(`${name}=${current ?? PREFERENCE_DEFAULT}${current === undefined ? ' (default)' : ''}`);
        }
        for (const [name, current] of stored) {
          if (!KNOWN_KEYS.includes(name)) console.log(`${name}=${current}`);
        }
        break;
      }
      case 'get': {
        if (!key) usage();
        console.log(await store.getPreference(key, PREFERENCE_DEFAULT));
        break;
      }
      case 'set': {
        if (!key || value === undefined) usage();
        const canonical = parsePreferenceValue(key, value);
        await store.setPreference(key, canonical);
        console.log(`✓ ${key}=${canonical}`);
        break;
      }
      case 'recipients': {
        const email = value;
        if (key === 'list') {
          const recipients = await getCustomRecipients(store);
          if (recipients.length === 0) console.log('No custom email recipients.');
          recipients.forEach((address, i) => console.log(`${i + 1}. ${address}`));
        } else if (key === 'add' && email) {
          const added = await addCustomRecipient(store, email);
          console.log(added ? `✓ Added ${email}` : `${email} is already in the list`);
        } else if (key === 'remove' && email) {
          const removed = await removeCustomRecipient(store, email);
          console.log(removed ? `✓ Removed ${email}` : `${email} is not in the list`);
        } else {
          usage();
        }
        break;
      }
      default:
        usage();
    }

    await closeDbClient();
  } catch (error) {
    logger.error('[PREFERENCES] Failed', error);
    await closeDbClient();
    process.exit(1);
  }
}

void main();
