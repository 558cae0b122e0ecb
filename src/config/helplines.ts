export interface Helpline {
    name: string;
    number: string;
}

// Included verbatim in every outbound alert
export const ALERT_HELPLINES: readonly Helpline[] = [
    { name: 'AASRA', number: '9820466726' },
    { name: 'Vandrevala', number: '1860-2662-345' },
    { name: 'iCall', number: '9152987821' },
    { name: 'NIMHANS', number: '080-46110007' }
];

export const formatHelplineBlock = (
    helplines: readonly Helpline[] = ALERT_HELPLINES,
    heading = '🆘 Immediate Help:'
): string => {
    const lines = helplines.map(helpline => `• ${helpline.name}: ${helpline.number}`);
    return [heading, ...lines].join('\n');
};
