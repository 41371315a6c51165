import 'dotenv/config';
import { loadConfig } from './config.js';
import { DeedServer } from './Server.js';
import { RegistryPlatform } from '../Platform/RegistryPlatform.js';
import { SQLiteEventStore } from '../infrastructure/persistence/SQLiteEventStore.js';

const config = loadConfig();
const store = new SQLiteEventStore(config.dbPath);
const platform = RegistryPlatform.create({ store, policy: config.policy });
const server = new DeedServer(platform, config.port, config.host);

server.start().catch((e: unknown) => {
    console.error('[DeedServer] Failed to start:', e instanceof Error ? e.message : e);
    store.close();
    process.exit(1);
});

process.on('SIGINT', () => {
    server.close().then(
        () => { store.close(); process.exit(0); },
        (e: unknown) => { console.error('[DeedServer] Shutdown error:', e); process.exit(1); }
    );
});
