import { DeploymentOption } from '../entities/deployment-option.entity';

export type DeploymentOptionSeed = Pick<
  DeploymentOption,
  'name' | 'option_type' | 'description' | 'configuration'
>;

export const DEPLOYMENT_OPTION_SEED: DeploymentOptionSeed[] = [
  {
    name: 'AWS Lambda',
    option_type: 'aws_lambda',
    description: 'Serverless deployment using AWS Lambda',
    configuration: {
      runtime: 'python3.9',
      memory_size: 512,
      timeout: 30,
      environment_variables: {},
      vpc_config: { enabled: false },
    },
  },
  {
    name: 'Kubernetes',
    option_type: 'kubernetes',
    description: 'Containerized deployment using Kubernetes',
    configuration: {
      replicas: 2,
      cpu_request: '100m',
      memory_request: '512Mi',
      cpu_limit: '500m',
      memory_limit: '1Gi',
      autoscaling: {
        enabled: true,
        min_replicas: 2,
        max_replicas: 10,
        target_cpu_utilization: 70,
      },
    },
  },
  {
    name: 'Standalone Server',
    option_type: 'standalone',
    description: 'Deployment to a standalone server',
    configuration: {
      server_type: 'virtual_machine',
      operating_system: 'ubuntu',
      requirements: { cpu_cores: 4, memory_gb: 8, disk_gb: 100 },
      installation: { method: 'ssh', port: 22 },
    },
  },
];
