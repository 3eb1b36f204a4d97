import React from 'react';
import { renderToStaticMarkup } from 'react-dom/server';
import type { RunOutcome, SimulationConfig } from './types';
import ComparisonReport from './components/ComparisonReport';

/**
 * Renders the comparison as a standalone HTML document.
 * Styling comes from the Tailwind CDN build, so the page needs network access
 * when opened to look right. The charts are inline SVG and render offline.
 */
export const renderReport = (config: SimulationConfig, outcomes: RunOutcome[]): string => {
    const body = renderToStaticMarkup(<ComparisonReport config={config} outcomes={outcomes} />);
    return [
        '<!DOCTYPE html>',
        '<html lang="en">',
        '<head>',
        '<meta charset="utf-8" />',
        '<title>Session Migration Comparison</title>',
        '<script src="https://cdn.tailwindcss.com"></script>',
        '</head>',
        `<body>${body}</body>`,
        '</html>'
    ].join('\n');
};
