import React from 'react';
import { ActivityClass } from '../types';
import type { LogEntry } from '../types';
import { activitySegments } from '../metrics';

interface ActivityTimelineProps {
    runs: { agent: string; log: LogEntry[] }[];
    horizon: number;
}

const getSegmentColor = (activity: ActivityClass) => {
    switch (activity) {
        case ActivityClass.TRANSMIT: return 'bg-amber-500';
        case ActivityClass.CPU_BURST: return 'bg-rose-500';
        case ActivityClass.IDLE: return 'bg-slate-300';
        case ActivityClass.ACTIVE_USE: return 'bg-emerald-500';
    }
};

/**
 * One track per agent showing what the device was doing at every step.
 */
const ActivityTimeline: React.FC<ActivityTimelineProps> = ({ runs, horizon }) => {
    const totalDuration = Math.max(horizon, 1);

    return (
        <div className="bg-white p-4 rounded-xl shadow-sm border border-slate-200">
            <h3 className="text-sm font-bold text-slate-700 uppercase tracking-wide mb-4">Device Activity Timeline</h3>

            <div className="space-y-3">
                {runs.map(run => (
                    <div key={run.agent} className="flex items-center gap-4">
                        <div className="w-24 shrink-0 text-right text-xs font-bold text-slate-600">{run.agent}</div>

                        <div className="flex-1 h-6 bg-slate-50 rounded flex overflow-hidden border border-slate-100">
                            {activitySegments(run.log).map(seg => (
                                <div
                                    key={seg.start}
                                    className={`h-full ${getSegmentColor(seg.activity)}`}
                                    style={{ width: `${((seg.end - seg.start) / totalDuration) * 100}%` }}
                                    title={`${seg.activity}: t=${seg.start}-${seg.end - 1}`}
                                />
                            ))}
                        </div>
                    </div>
                ))}
            </div>

            {/* Time Axis */}
            <div className="flex pl-28 mt-1 justify-between text-[9px] text-slate-400 font-mono">
                <span>t=0</span>
                <span>t={horizon - 1}</span>
            </div>

            {/* Legend */}
            <div className="flex justify-center gap-4 mt-3 text-[10px] text-slate-500">
                {Object.values(ActivityClass).map(activity => (
                    <div key={activity} className="flex items-center gap-1">
                        <div className={`w-3 h-3 rounded-sm ${getSegmentColor(activity)}`}></div> {activity}
                    </div>
                ))}
            </div>
        </div>
    );
};

export default ActivityTimeline;
