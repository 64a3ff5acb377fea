import { randomUUID } from "node:crypto";

/** Random identifier with an optional type prefix: `txn_3f2c...` */
export function generateId(prefix?: string): string {
	const id = randomUUID().replace(/-/g, "");
	return prefix ? `${prefix}_${id}` : id;
}
