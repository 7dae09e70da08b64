import "reflect-metadata";
import { DataSource } from "typeorm";
import { getConfig } from "../config/env";
import { Application } from "./entities/application.entity";
import { Interview } from "./entities/interview.entity";
import { ChatSession } from "./entities/chat-session.entity";
import { ChatTurn } from "./entities/chat-turn.entity";
import { Evaluation } from "./entities/evaluation.entity";
import { InterviewResult } from "./entities/interview-result.entity";

const appConfig = getConfig();

export const AppDataSource = new DataSource({
    type: "postgres",
    url: appConfig.databaseUrl,
    synchronize: false,
    logging: appConfig.nodeEnv === 'development',
    entities: [Application, Interview, ChatSession, ChatTurn, Evaluation, InterviewResult],
    migrations: [__dirname + '/migrations/*.{ts,js}'],
});
