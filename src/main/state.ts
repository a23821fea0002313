import { BehaviorSubject, filter } from 'rxjs';
import { AppConfig, DEFAULT_CONFIG } from './config';

export const _dataRoot$ = new BehaviorSubject('');
export const dataRoot$ = _dataRoot$.pipe(
    filter(dataRoot => dataRoot !== ''),
)

export const configStore$ = new BehaviorSubject<AppConfig>(DEFAULT_CONFIG);
