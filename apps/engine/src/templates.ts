import { TemplateRegistry, WorkflowTemplate } from '@agentchain/sdk';

// Built-in templates served by ListTemplates / ExecuteTemplate
export const githubToSlack: WorkflowTemplate = {
    name: 'github_to_slack',
    displayName: 'GitHub to Slack',
    description: 'Fetch GitHub repositories and post a summary to Slack',
    requiredParams: ['github_agent_id', 'slack_agent_id'],
    steps: [
        {
            stepName: 'fetch_repos',
            agentParam: 'github_agent_id',
            message: 'List my GitHub repositories with a short description of each',
        },
        {
            stepName: 'send_to_slack',
            agentParam: 'slack_agent_id',
            message: 'Post a summary of these repositories to the team Slack channel',
            dependsOn: ['fetch_repos'],
        },
    ],
};

export const codeReviewWorkflow: WorkflowTemplate = {
    name: 'code_review_workflow',
    displayName: 'Code Review Workflow',
    description: 'Collect recent commits and notify reviewers on Slack',
    requiredParams: ['github_agent_id', 'slack_agent_id'],
    steps: [
        {
            stepName: 'get_commits',
            agentParam: 'github_agent_id',
            message: 'Get the latest commits that need review',
        },
        {
            stepName: 'notify_reviewers',
            agentParam: 'slack_agent_id',
            message: 'Notify the reviewers on Slack about these commits',
            dependsOn: ['get_commits'],
        },
    ],
};

export function registerBuiltinTemplates(registry: TemplateRegistry): TemplateRegistry {
    registry.register(githubToSlack);
    registry.register(codeReviewWorkflow);
    return registry;
}
