// npx knex migrate:latest --env production
// npx knex migrate:rollback --env production

import { Knex } from "knex";
import { CREATE_TRANSACTIONS_TABLE, DROP_TRANSACTIONS_TABLE } from "../src/schema";

export async function up(knex: Knex): Promise<void> {
  await knex.schema.raw(CREATE_TRANSACTIONS_TABLE);
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.raw(DROP_TRANSACTIONS_TABLE);
}
