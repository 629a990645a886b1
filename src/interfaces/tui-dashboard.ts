import blessed from 'blessed';
import contrib from 'blessed-contrib';
import { CallbackSink } from '../core/events.js';
import type { EventSink } from '../types/events.js';
import {
    applyEvent,
    createDashboardState,
    formatRow,
    passRate,
    statusMarkdown,
} from './dashboard-model.js';

export interface DashboardOptions {
    targetDir: string;
    /** Called on Escape, q or C-c. */
    onQuit: () => void;
}

export interface DashboardHandle {
    /** Register on the run's emitter to feed the dashboard. */
    readonly sink: EventSink;
    destroy(): void;
}

/** Full-screen terminal view of a watch session. */
export function startDashboard(options: DashboardOptions): DashboardHandle {
    const screen = blessed.screen({ smartCSR: true });
    screen.title = 'Aether Pipeline Dashboard';

    const grid = new contrib.grid({ rows: 12, cols: 12, screen: screen });

    const testsBox = grid.set(0, 0, 7, 8, blessed.box, {
        label: ' Tests ',
        tags: true,
        scrollable: true,
    });

    const passDonut = grid.set<typeof contrib.donut, contrib.Widgets.DonutElement>(0, 8, 4, 4, contrib.donut, {
        label: ' Pass Rate ',
        radius: 12,
        arcWidth: 4,
        yPadding: 2,
    });

    const statusView = grid.set(4, 8, 3, 4, contrib.markdown, {
        label: ' Status ',
    });

    const logView = grid.set(7, 0, 5, 12, contrib.log, {
        fg: 'green',
        selectedFg: 'green',
        label: ' Pipeline Events ',
    });

    let state = createDashboardState();

    const render = () => {
        testsBox.setContent(state.rows.length > 0 ? state.rows.map(formatRow).join('\n') : 'Waiting for changes...');
        passDonut.setData([{ percent: passRate(state), label: 'Passed', color: 'green' }]);
        statusView.setMarkdown(statusMarkdown(state, options.targetDir));
        screen.render();
    };

    const sink = new CallbackSink((event) => {
        state = applyEvent(state, event);
        const line = state.logs.at(-1);
        if (line) logView.log(line);
        render();
    });

    screen.key(['escape', 'q', 'C-c'], () => {
        options.onQuit();
    });

    render();
    return {
        sink,
        destroy: () => {
            screen.destroy();
        },
    };
}
