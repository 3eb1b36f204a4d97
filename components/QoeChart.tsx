import React from 'react';
import { CartesianGrid, Legend, Line, LineChart, ReferenceLine, XAxis, YAxis } from 'recharts';
import type { LogEntry } from '../types';
import { qoeSeries } from '../metrics';

interface QoeChartProps {
    runs: { agent: string; log: LogEntry[] }[];
    /** Step of the device switch, marked on the chart */
    switchStep?: number;
}

const LINE_COLORS = ['#ef4444', '#f59e0b', '#3b82f6', '#8b5cf6', '#10b981'];

/**
 * Merges per-agent series into one row per step, keyed by agent name.
 */
export const mergeQoeSeries = (runs: QoeChartProps['runs']): Record<string, number>[] => {
    const rows: Record<string, number>[] = [];
    runs.forEach(run => {
        qoeSeries(run.log).forEach((point, i) => {
            if (!rows[i]) rows[i] = { timeStep: point.timeStep };
            rows[i][run.agent] = point.qoe;
        });
    });
    return rows;
};

const QoeChart: React.FC<QoeChartProps> = ({ runs, switchStep }) => {
    const data = mergeQoeSeries(runs);

    return (
        <div className="bg-white p-4 rounded-xl shadow-sm border border-slate-200">
            <h3 className="text-sm font-bold text-slate-700 uppercase tracking-wide mb-4">Quality of Experience</h3>
            <LineChart width={1000} height={260} data={data}>
                <CartesianGrid strokeDasharray="3 3" vertical={false} />
                <XAxis dataKey="timeStep" type="number" domain={['dataMin', 'dataMax']} tick={{ fontSize: 10 }} />
                <YAxis domain={[0, 5.5]} tick={{ fontSize: 10 }} />
                <Legend />
                {switchStep !== undefined && (
                    <ReferenceLine x={switchStep} stroke="green" strokeDasharray="3 3" label="Switch" />
                )}
                {runs.map((run, i) => (
                    <Line
                        key={run.agent}
                        type="stepAfter"
                        dataKey={run.agent}
                        stroke={LINE_COLORS[i % LINE_COLORS.length]}
                        strokeWidth={2}
                        dot={false}
                        isAnimationActive={false}
                    />
                ))}
            </LineChart>
        </div>
    );
};

export default QoeChart;
