import type { PromptRegistry } from './prompt.registry.js';

export interface RcaPromptOptions {
    /** Jira base URL used to link ticket references found in job comments. */
    jiraUrl: string;
    workDir?: string;
}

export function registerRcaPrompt(prompts: PromptRegistry, options: RcaPromptOptions): void {
    const jiraUrl = options.jiraUrl.replace(/\/$/, '');
    const workDir = options.workDir ?? '/tmp/dci';

    prompts.register({
        definition: {
            name: 'rca',
            description: 'Root cause analysis instructions for a failed DCI job',
            arguments: [{ name: 'dci_job_id', description: 'The DCI job to analyse', required: true }],
        },
        render: (args) => {
            const jobId = (args.dci_job_id ?? '').trim();
            const text = [
                `Conduct a root cause analysis (RCA) of DCI job ${jobId}.`,
                `Store every downloaded file under ${workDir}/${jobId} and never download a file twice.`,
                'Always download events.txt when the job has one and use it to build the timeline.',
                `Write the report to ${workDir}/rca-${jobId}.md. Include the timeline of events and the job details: components, topic and pipeline name.`,
                `Replace every CILAB-<num> reference with ${jiraUrl}/browse/CILAB-<num>, and link the DCI job id wherever the report mentions it.`,
                '',
                'logjuicer.txt (regular files) and logjuicer_omg.txt (must-gather) compare the logs with a previous successful run.',
                'Use the omc utility to inspect must-gather archives.',
            ].join('\n');
            return [{ role: 'user', content: { type: 'text', text } }];
        },
    });
}
