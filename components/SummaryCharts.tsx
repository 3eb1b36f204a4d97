import React from 'react';
import { Bar, BarChart, CartesianGrid, Cell, LabelList, XAxis, YAxis } from 'recharts';
import type { RunSummary } from '../types';

export interface SummaryRow {
    agent: string;
    summary: RunSummary;
}

interface SummaryChartsProps {
    rows: SummaryRow[];
}

type SummaryMetric = keyof RunSummary;

const PANELS: { metric: SummaryMetric; title: string; lowerIsBetter: boolean }[] = [
    { metric: 'handoverLatencySteps', title: 'Handover Latency (steps)', lowerIsBetter: true },
    { metric: 'totalPowerUnits', title: 'Total Power Consumed (units)', lowerIsBetter: true },
    { metric: 'kleinrockPower', title: "Kleinrock's Power (γ/T)", lowerIsBetter: false }
];

const AGENT_COLORS = ['#ef4444', '#f59e0b', '#3b82f6', '#8b5cf6', '#10b981'];

// Static markup has no container to measure, so charts get fixed sizes
const CHART_WIDTH = 320;
const CHART_HEIGHT = 220;

/**
 * One bar chart per headline metric, one bar per agent.
 */
const SummaryCharts: React.FC<SummaryChartsProps> = ({ rows }) => {
    return (
        <div className="grid grid-cols-3 gap-4">
            {PANELS.map(panel => {
                const data = rows.map(r => ({ agent: r.agent, value: r.summary[panel.metric] }));
                return (
                    <div key={panel.metric} className="bg-white p-4 rounded-xl shadow-sm border border-slate-200">
                        <h3 className="text-sm font-bold text-slate-700 uppercase tracking-wide mb-1">{panel.title}</h3>
                        <p className="text-[10px] text-slate-400 mb-2">{panel.lowerIsBetter ? 'Lower is better' : 'Higher is better'}</p>
                        <BarChart width={CHART_WIDTH} height={CHART_HEIGHT} data={data}>
                            <CartesianGrid strokeDasharray="3 3" vertical={false} stroke="#f1f5f9" />
                            <XAxis dataKey="agent" tick={{ fontSize: 10, fill: '#94a3b8' }} axisLine={false} tickLine={false} />
                            <YAxis tick={{ fontSize: 10, fill: '#94a3b8' }} axisLine={false} tickLine={false} width={40} />
                            <Bar dataKey="value" radius={[4, 4, 0, 0]} isAnimationActive={false}>
                                {data.map((entry, index) => (
                                    <Cell key={`cell-${entry.agent}`} fill={AGENT_COLORS[index % AGENT_COLORS.length]} />
                                ))}
                                <LabelList dataKey="value" position="top" fontSize={10} formatter={(v: unknown) => (typeof v === 'number' ? v.toFixed(2) : String(v))} />
                            </Bar>
                        </BarChart>
                    </div>
                );
            })}
        </div>
    );
};

export default SummaryCharts;
