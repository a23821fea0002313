import "reflect-metadata"
import { DataSource } from "typeorm"
import { catchError, EMPTY, from, shareReplay, switchMap } from "rxjs";
import path from "path";
import { dataRoot$ } from "../../state";
import { logToFile } from '../../log';
import { NoteEntity } from "./entity/Note";
import { PageEntity } from "./entity/Page";
import { FlashCardEntity } from "./entity/FlashCard";
import { ProcessingJobEntity } from "./entity/ProcessingJob";
import { UserEntity } from "./entity/User";
import { UsageEntity } from "./entity/Usage";

export const ENTITIES = [
    NoteEntity,
    PageEntity,
    FlashCardEntity,
    ProcessingJobEntity,
    UserEntity,
    UsageEntity,
];

/** Opens (and creates, when missing) the document store; `:memory:` gives a throwaway one. */
export const openDataSource = async (database: string) => {
    const dataSource = new DataSource({
        type: "sqlite",
        database,
        synchronize: true,
        logging: false,
        entities: ENTITIES,
        migrations: [],
        subscribers: [],
    });
    await dataSource.initialize();
    logToFile('datasource ready on:', database);
    return dataSource;
};

export const datasource$ = dataRoot$.pipe(
    switchMap((dataRoot) => from(openDataSource(path.join(dataRoot, "database.sqlite")))),
    catchError((e) => {
        logToFile('open datasource failed:', e);
        return EMPTY;
    }),
    shareReplay(1),
);
