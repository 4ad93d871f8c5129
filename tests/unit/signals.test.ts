import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { createSignalHandlers } from "@/cli/signals";
import { ControlSignal } from "@/core";
import { EXIT_CODE_STOPPED } from "@/utils/constants";
import { LogLevel, log } from "@/utils/logger";

describe("createSignalHandlers", () => {
    let control: ControlSignal;
    let exitCodes: number[];

    beforeEach(() => {
        log.setLevel(LogLevel.SILENT);
        control = new ControlSignal();
        exitCodes = [];
    });

    afterEach(() => {
        log.setLevel(LogLevel.INFO);
    });

    test("the first interrupt stops without exiting", () => {
        const { interrupt } = createSignalHandlers(control, code => exitCodes.push(code));

        interrupt();

        expect(control.isStopped).toBe(true);
        expect(exitCodes).toEqual([]);
    });

    test("a second interrupt exits as stopped", () => {
        const { interrupt } = createSignalHandlers(control, code => exitCodes.push(code));

        interrupt();
        interrupt();

        expect(exitCodes).toEqual([EXIT_CODE_STOPPED]);
    });

    test("togglePause alternates between pause and resume", () => {
        const { togglePause } = createSignalHandlers(control, code => exitCodes.push(code));

        togglePause();
        expect(control.isPaused).toBe(true);

        togglePause();
        expect(control.isPaused).toBe(false);
    });
});
