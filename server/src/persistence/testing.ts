import { DataSource } from "typeorm";
import { ENTITIES } from "./entities";

/** Fresh in-memory SQLite schema for specs. */
export async function createTestDataSource(): Promise<DataSource> {
	const dataSource = new DataSource({
		type: "better-sqlite3",
		database: ":memory:",
		synchronize: true,
		entities: ENTITIES,
	});
	return dataSource.initialize();
}
