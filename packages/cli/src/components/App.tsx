import React, { useEffect, useRef, useState } from 'react';
import { Box, Text, useApp, useInput } from 'ink';
import type {
  DebugInfo,
  EngineState,
  StepwiseConfig,
  TaskMessage,
  ToolExecutionRecord,
} from '@stepwise/shared';
import type { AgentEngine } from '@stepwise/core';
import { THEME } from '../theme.js';
import type { EngineBridge, PendingApproval } from '../engine.bridge.js';
import { useAppStore } from '../store/app.store.js';
import { handleSlashCommand, CLEAR_SENTINEL } from '../slash.commands.js';
import { Header } from './Header.js';
import { EnginePanel } from './EnginePanel.js';
import { ApprovalPrompt } from './ApprovalPrompt.js';
import { BreakpointNotice } from './BreakpointNotice.js';
import { InputBar, type InputMode } from './InputBar.js';

interface AppProps {
  config: StepwiseConfig;
  engine: AgentEngine;
  bridge: EngineBridge;
  /** Runs as soon as the UI mounts. */
  initialTask?: string;
}

function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ---------------------------------------------------------------------------
// App
// ---------------------------------------------------------------------------

export const App: React.FC<AppProps> = ({ config, engine, bridge, initialTask }) => {
  const { exit } = useApp();
  const [state, dispatch] = useAppStore();
  const [spinnerFrame, setSpinnerFrame] = useState(0);
  const startedInitial = useRef(false);

  // ── Engine and bridge event wiring ────────────────────────────────────────
  useEffect(() => {
    const onStatus = (s: EngineState) => dispatch({ type: 'ENGINE_STATUS', state: s });
    const onMessage = (m: TaskMessage) => dispatch({ type: 'ENGINE_MESSAGE', message: m });
    const onTool = (r: ToolExecutionRecord) => dispatch({ type: 'TOOL_EXECUTED', record: r });
    const onApproval = (p: PendingApproval | null) => dispatch({ type: 'APPROVAL', pending: p });
    const onBreak = (info: DebugInfo | null) => dispatch({ type: 'BREAK', info });
    const onFailure = (err: Error) =>
      dispatch({ type: 'ADD_MESSAGE', message: `! Debugger: ${err.message}` });

    engine.on('status', onStatus);
    engine.on('message', onMessage);
    engine.on('tool', onTool);
    bridge.on('approval', onApproval);
    bridge.on('break', onBreak);
    bridge.on('failure', onFailure);

    return () => {
      engine.off('status', onStatus);
      engine.off('message', onMessage);
      engine.off('tool', onTool);
      bridge.off('approval', onApproval);
      bridge.off('break', onBreak);
      bridge.off('failure', onFailure);
    };
  }, [engine, bridge, dispatch]);

  // ── Spinner ────────────────────────────────────────────────────────────────
  useEffect(() => {
    if (state.phase !== 'running') return;
    const timer = setInterval(() => setSpinnerFrame((f) => f + 1), 120);
    return () => clearInterval(timer);
  }, [state.phase]);

  // ── Task execution ─────────────────────────────────────────────────────────
  const runTask = (task: string) => {
    dispatch({ type: 'TASK_STARTED', task });
    const debugCallback = config.debug.enabled ? bridge : undefined;
    engine.executeTask(task, debugCallback).then(
      (result) => dispatch({ type: 'TASK_FINISHED', message: `✓ ${result}` }),
      (err: unknown) => dispatch({ type: 'TASK_FINISHED', message: `Error: ${errorText(err)}` }),
    );
  };

  useEffect(() => {
    if (initialTask && !startedInitial.current) {
      startedInitial.current = true;
      runTask(initialTask);
    }
  }, []); // eslint-disable-line react-hooks/exhaustive-deps

  // ── Keyboard: Ctrl+C ───────────────────────────────────────────────────────
  useInput((input, key) => {
    if (key.ctrl && input === 'c') {
      bridge.cancelAll();
      exit();
    }
  });

  // ── Input handler ──────────────────────────────────────────────────────────
  const handleInput = async (input: string) => {
    if (input.startsWith('/')) {
      const result = await handleSlashCommand(input, { config, engine });
      if (result === 'exit') {
        bridge.cancelAll();
        exit();
        return;
      }
      if (result === CLEAR_SENTINEL) {
        dispatch({ type: 'CLEAR_MESSAGES' });
        return;
      }
      dispatch({ type: 'SET_SLASH_OUTPUT', output: result });
      return;
    }

    if (state.phase === 'running') {
      await engine.saveUserInput(input);
      dispatch({ type: 'ADD_MESSAGE', message: `note: ${input}` });
      return;
    }

    runTask(input);
  };

  const submit = (input: string) => {
    handleInput(input).catch((err: unknown) => {
      dispatch({ type: 'ADD_MESSAGE', message: `Error: ${errorText(err)}` });
    });
  };

  // ── Render ─────────────────────────────────────────────────────────────────
  const inputMode: InputMode = state.phase;
  const showPanel =
    state.phase !== 'idle' && (state.recentMessages.length > 0 || state.recentTools.length > 0);

  return (
    <Box flexDirection="column">
      <Header model={config.provider.model} engine={state.engine} spinnerFrame={spinnerFrame} />

      {showPanel && (
        <EnginePanel engine={state.engine} messages={state.recentMessages} tools={state.recentTools} />
      )}

      {state.slashOutput && (
        <Box flexDirection="column" borderStyle="single" borderColor={THEME.primary} paddingX={1}>
          {state.slashOutput.split('\n').map((line, i) => (
            <Text key={i} color={messageColor(line)}>
              {line}
            </Text>
          ))}
        </Box>
      )}

      {state.messages.length > 0 && (
        <Box flexDirection="column" marginTop={1} paddingX={1}>
          {state.messages.map((msg, i) => (
            <Text key={i} color={messageColor(msg)}>
              {msg}
            </Text>
          ))}
        </Box>
      )}

      {state.approval ? (
        <ApprovalPrompt pending={state.approval} onAnswer={(ok) => bridge.answerApproval(ok)} />
      ) : state.breakpoint ? (
        <BreakpointNotice info={state.breakpoint} onContinue={() => bridge.resume()} />
      ) : (
        <InputBar
          mode={inputMode}
          onSubmit={submit}
          completionMessage={state.messages[state.messages.length - 1]}
        />
      )}
    </Box>
  );
};

function messageColor(msg: string): string {
  if (msg.startsWith('✓')) return THEME.success;
  if (msg.startsWith('!') || msg.startsWith('note:')) return THEME.warning;
  if (msg.startsWith('Error')) return THEME.error;
  return THEME.textDim;
}
