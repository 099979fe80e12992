import { configure, makeAutoObservable } from 'mobx';

configure({
    enforceActions: 'never',
});

export class UiState {
    constructor(readonly maxLogLength = 5) {
        makeAutoObservable(this, {maxLogLength: false}, {autoBind: true});
    }
    corpusFileCount = 0;
    targetFileCount = 0;
    analyzedFileCount = 0;
    scannedDeclarationCount = 0;
    findingCount = 0;
    currentAction = '';
    logLines: string[] = [];
    log(line: string) {
        this.logLines.push(line);
        if(this.logLines.length > this.maxLogLength) {
            this.logLines.shift();
        }
    }
}

export interface ProgressUi {
    state: UiState;
    /** True every 100 calls or 100ms; the caller then yields so the UI can repaint */
    occasionallyAwait(): boolean;
}

export function createOccasionalAwaiter(now: () => number = Date.now) {
    let i = 0;
    let lastTime = now();
    return function occasionallyAwait() {
        const time = now();
        if(++i >= 100 || lastTime + 100 < time) {
            i = 0;
            lastTime = time;
            return true;
        }
        return false;
    };
}

/** Tracks progress without rendering anything */
export function createHeadlessUi(): ProgressUi {
    return {state: new UiState(), occasionallyAwait: createOccasionalAwaiter()};
}
