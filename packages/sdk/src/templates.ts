import { NotFoundError, ValidationError } from './errors';
import { WorkflowDefinition } from './types';

export interface TemplateStep {
    /** Name of the template parameter that supplies the agent id. */
    agentParam: string;
    message: string;
    stepName: string;
    dependsOn?: string[];
}

export interface WorkflowTemplate {
    name: string;
    displayName: string;
    description: string;
    requiredParams: string[];
    steps: TemplateStep[];
}

export type TemplateInfo = Omit<WorkflowTemplate, 'steps'>;

export class TemplateRegistry {
    private templates = new Map<string, WorkflowTemplate>();
    private static readonly NAME_PATTERN = /^[a-zA-Z0-9_-]+$/;
    private static readonly MAX_NAME_LENGTH = 100;

    register(template: WorkflowTemplate): WorkflowTemplate {
        const { name } = template;
        if (!name || name.length === 0) {
            throw new Error('Template name cannot be empty');
        }
        if (name.length > TemplateRegistry.MAX_NAME_LENGTH) {
            throw new Error(`Template name exceeds maximum length of ${TemplateRegistry.MAX_NAME_LENGTH} characters`);
        }
        if (!TemplateRegistry.NAME_PATTERN.test(name)) {
            throw new Error('Template name must contain only alphanumeric characters, dashes, and underscores');
        }
        if (this.templates.has(name)) {
            throw new Error(`Template "${name}" is already registered.`);
        }
        this.templates.set(name, template);
        return template;
    }

    get(name: string): WorkflowTemplate | undefined {
        return this.templates.get(name);
    }

    list(): TemplateInfo[] {
        return Array.from(this.templates.values(), ({ steps: _steps, ...info }) => info);
    }

    /** Templates always run sequentially. */
    instantiate(name: string, params: Readonly<Record<string, string>>, workflowName?: string): WorkflowDefinition {
        const template = this.templates.get(name);
        if (!template) {
            throw new NotFoundError('Template', name);
        }

        const missing = template.requiredParams.filter(p => !params[p]);
        if (missing.length > 0) {
            throw new ValidationError(`Missing required parameters: ${missing.join(', ')}`);
        }

        return {
            name: workflowName || template.displayName,
            description: template.description,
            parallel: false,
            steps: template.steps.map(step => {
                const agentId = params[step.agentParam];
                if (!agentId) {
                    throw new ValidationError(`Template "${name}" step ${step.stepName} needs parameter ${step.agentParam}`);
                }
                return {
                    agentId,
                    message: step.message,
                    stepName: step.stepName,
                    dependsOn: step.dependsOn ?? [],
                };
            }),
        };
    }
}
