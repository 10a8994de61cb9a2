"use client";
import { createContext, useContext, useMemo, useReducer } from "react";
import { useSessionDriver } from "./hooks/useSessionDriver";
import {
  createInitialState,
  sessionReducer,
  type SessionSettings,
  type SessionState,
} from "./session";
import type { Difficulty } from "./types";

type QuizSessionContext = {
  state: SessionState;
  select: (option: string) => void;
  submit: () => void;
  skipWait: () => void;
  retry: () => void;
  restart: (difficulty?: Difficulty) => void;
};

const Ctx = createContext<QuizSessionContext | null>(null);

export function QuizSessionProvider({
  settings,
  children,
}: {
  settings: SessionSettings;
  children: React.ReactNode;
}) {
  const [state, dispatch] = useReducer(sessionReducer, settings, createInitialState);
  useSessionDriver(state, dispatch);

  const api = useMemo<QuizSessionContext>(() => ({
    state,
    select: (option) => dispatch({ type: "optionSelected", option }),
    submit: () => dispatch({ type: "answerSubmitted" }),
    skipWait: () => dispatch({ type: "advance" }),
    retry: () => dispatch({ type: "retry" }),
    restart: (difficulty) => dispatch({ type: "restart", difficulty }),
  }), [state]);

  return <Ctx.Provider value={api}>{children}</Ctx.Provider>;
}

export function useQuizSession() {
  const v = useContext(Ctx);
  if (!v) throw new Error("useQuizSession must be used inside QuizSessionProvider");
  return v;
}
