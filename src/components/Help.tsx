import React from 'react';
import {Box, Text} from 'ink';

export type HelpProps = {
  version: string;
};

const FLAGS: Array<[string, string]> = [
  ['-C, --cluster-id <id>', 'Cluster name, ID, or external ID (required)'],
  ['--url <url>', 'Management API URL (default: $OCM_URL or https://api.openshift.com)'],
  ['--token <token>', 'Access token (default: $OCM_TOKEN, config file, or `ocm token`)'],
  ['-h, --help', 'Show this help'],
  ['-v, --version', 'Print the version'],
];

const Help: React.FC<HelpProps> = ({version}) => (
  <Box flexDirection="column" paddingX={1}>
    <Text color="magentaBright" bold>
      hcpstat {version}
    </Text>
    <Text>Show HCP cluster health from the cluster management API&apos;s live resources.</Text>
    <Box marginTop={1} flexDirection="column">
      <Text color="green" bold>
        USAGE
      </Text>
      <Text>  hcpstat --cluster-id my-cluster</Text>
    </Box>
    <Box marginTop={1} flexDirection="column">
      <Text color="green" bold>
        FLAGS
      </Text>
      {FLAGS.map(([flag, description]) => (
        <Box key={flag}>
          <Box width={26}>
            <Text color="cyan">  {flag}</Text>
          </Box>
          <Text>{description}</Text>
        </Box>
      ))}
    </Box>
  </Box>
);

export default Help;
