import React from 'react';
import {observer} from 'mobx-react-lite';
import {render, Text} from 'ink';
import { createOccasionalAwaiter, ProgressUi, UiState } from './ui-state';

// Simple react-based live readout of analysis progress

export interface Ui extends ProgressUi {
    start(): void;
    stop(): void;
}

export function createUi(): Ui {
    const state = new UiState();
    let instance: ReturnType<typeof render> | undefined;

    function start() {
        instance = render(<Progress state={state}/>);
    }
    function stop() {
        instance?.unmount();
        instance = undefined;
    }
    return {state, start, stop, occasionallyAwait: createOccasionalAwaiter()};
}

interface ProgressProps { state: UiState; }
const Progress = observer((props: ProgressProps) => {
    const {state} = props;
    return <>
        {state.logLines.map((line, i) => <Text key={i} color="green">{line}</Text>)}
        <Text color="blue">{state.currentAction}</Text>
        <Text>Solidity files under root: {state.corpusFileCount}</Text>
        <Text>Analyzed files: {state.analyzedFileCount} / {state.targetFileCount}</Text>
        <Text>Scanned functions: {state.scannedDeclarationCount}</Text>
        <Text>Unused functions: {state.findingCount}</Text>
    </>;
});
