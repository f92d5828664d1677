import "reflect-metadata";
import { DataSource } from "typeorm";
import { getConfig } from "../config/env";
import { Job } from "./entities/job.entity";
import { JobArtifact } from "./entities/job-artifact.entity";
import { File } from "./entities/file.entity";
import { InitialSchema1760000000000 } from "./migrations/1760000000000-initial-schema";

const config = getConfig();

export const AppDataSource = new DataSource({
    type: "postgres",
    url: config.databaseUrl,
    synchronize: false,
    logging: config.nodeEnv === 'development',
    entities: [Job, JobArtifact, File],
    migrations: [InitialSchema1760000000000],
});
