import os from "node:os";
import path from "node:path";

// Every test file gets its own in-memory SQLite database; a local .env must
// never point the suite at a real MySQL server.
process.env.MYSQL_HOST = "";
process.env.MYSQL_DATABASE = "";
process.env.MYSQL_USER = "";
process.env.LOCAL_DB_PATH = ":memory:";
process.env.UPLOAD_DIR = path.join(os.tmpdir(), "pawn-ledger-test-uploads");
process.env.SEED_ADMIN_PASSWORD = "test-secret";
process.env.PUBLIC_URL = "http://ledger.test";
