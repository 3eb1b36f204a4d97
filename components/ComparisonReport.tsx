import React from 'react';
import { ScenarioEventType } from '../types';
import type { RunOutcome, SimulationConfig } from '../types';
import MetricsCard from './MetricsCard';
import SummaryCharts from './SummaryCharts';
import QoeChart from './QoeChart';
import ActivityTimeline from './ActivityTimeline';
import { averageQoe } from '../metrics';

interface ComparisonReportProps {
    config: SimulationConfig;
    outcomes: RunOutcome[];
}

/**
 * Whole-page comparison of every agent's run.
 */
const ComparisonReport: React.FC<ComparisonReportProps> = ({ config, outcomes }) => {
    const runs = outcomes.flatMap(o => (o.ok ? [o] : []));
    const failures = outcomes.flatMap(o => (o.ok ? [] : [o]));
    const switchStep = config.events.find(e => e.event.type === ScenarioEventType.DEVICE_SWITCH_INTENT)?.step;

    return (
        <div className="p-6 bg-slate-50 space-y-6">
            <header>
                <h1 className="text-xl font-bold text-slate-800">Session Migration Comparison</h1>
                <p className="text-xs text-slate-500">
                    {config.horizon} steps of {config.secondsPerStep}s, {config.sessionSizeMB} MB session
                </p>
            </header>

            {failures.length > 0 && (
                <div className="bg-red-50 border border-red-200 rounded-xl p-4 text-sm text-red-700">
                    {failures.map(f => (
                        <p key={f.agent}>{f.agent} failed: {f.error.message}</p>
                    ))}
                </div>
            )}

            {runs.map(run => (
                <section key={run.agent}>
                    <h2 className="text-sm font-bold text-slate-700 mb-2">{run.agent}</h2>
                    <div className="grid grid-cols-5 gap-4">
                        <MetricsCard label="Handover Latency" value={run.summary.handoverLatencySteps} decimals={0} unit="steps" colorClass="text-rose-600" />
                        <MetricsCard label="Total Power" value={run.summary.totalPowerUnits} unit="units" colorClass="text-amber-600" />
                        <MetricsCard label="Kleinrock's Power" value={run.summary.kleinrockPower} colorClass="text-blue-600" />
                        <MetricsCard label="Proactive Data" value={run.summary.proactiveDataMB} unit="MB" colorClass="text-emerald-600" />
                        <MetricsCard label="Mean QoE" value={averageQoe(run.log)} subtext={`${config.qoePoor} while blocked`} colorClass="text-violet-600" />
                    </div>
                </section>
            ))}

            <SummaryCharts rows={runs} />
            <QoeChart runs={runs} switchStep={switchStep} />
            <ActivityTimeline runs={runs} horizon={config.horizon} />
        </div>
    );
};

export default ComparisonReport;
