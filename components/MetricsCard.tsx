import React from 'react';

/**
 * Props for the MetricsCard component.
 */
interface MetricsCardProps {
  /** The title of the metric (e.g., "Handover Latency") */
  label: string;
  /** The value to display. Numbers are formatted to `decimals` places. */
  value: string | number;
  decimals?: number;
  /** Optional unit suffix (e.g., "steps", "MB") */
  unit?: string;
  /** Tailwind text color class for the value */
  colorClass?: string;
  /** Small explanatory text below the value */
  subtext?: string;
}

/**
 * Displays a single run statistic.
 */
const MetricsCard: React.FC<MetricsCardProps> = ({ label, value, decimals = 2, unit, colorClass = "text-blue-600", subtext }) => {
  return (
    <div className="bg-white p-4 rounded-xl shadow-sm border border-slate-200 flex flex-col justify-between">
      <span className="text-xs font-semibold text-slate-500 uppercase tracking-wider mb-2">{label}</span>
      <div>
        <div className="flex items-baseline space-x-1">
          <span className={`text-2xl font-bold ${colorClass}`}>{typeof value === 'number' && isFinite(value) ? value.toFixed(decimals) : value}</span>
          {unit && <span className="text-slate-400 text-sm font-medium">{unit}</span>}
        </div>
        {subtext && <p className="text-xs text-slate-400 mt-1">{subtext}</p>}
      </div>
    </div>
  );
};

export default MetricsCard;
