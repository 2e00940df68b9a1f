import type { Principal } from '@dfinity/principal';

import type { CreateServiceNervousSystem, Duration, Image, Percentage, Tokens } from './idl/governance';
import type { ConfigProposal } from './type';

const tokens = (e8s: bigint): [Tokens] => [{ e8s: [e8s] }];
const duration = (seconds: bigint): [Duration] => [{ seconds: [seconds] }];
const percentage = (basisPoints: bigint): [Percentage] => [{ basis_points: [basisPoints] }];

/**
 * Builds the service creation payload. The owner is both the fallback controller and
 * the controller of the single developer neuron (memo 0).
 */
export const buildCreateServiceNervousSystem = (
  proposal: ConfigProposal,
  owner: Principal,
): CreateServiceNervousSystem => {
  const { token, governance, swap, distribution } = proposal;
  const logo: Image = { base64_encoding: [proposal.logo] };

  return {
    name: [proposal.name],
    description: [proposal.description],
    url: [proposal.url],
    logo: [logo],
    fallback_controller_principal_ids: [owner],
    dapp_canisters: [],
    ledger_parameters: [
      {
        transaction_fee: tokens(token.fee),
        token_symbol: [token.symbol],
        token_logo: [logo],
        token_name: [token.name],
      },
    ],
    governance_parameters: [
      {
        neuron_maximum_dissolve_delay_bonus: percentage(governance.maximumDissolveDelayBonus),
        neuron_maximum_age_bonus: percentage(governance.maximumAgeBonus),
        neuron_minimum_stake: tokens(governance.minimumStake),
        neuron_maximum_age_for_age_bonus: duration(governance.maximumAgeForAgeBonus),
        neuron_maximum_dissolve_delay: duration(governance.maximumDissolveDelay),
        neuron_minimum_dissolve_delay_to_vote: duration(governance.minimumDissolveDelayToVote),
        proposal_initial_voting_period: duration(governance.initialVotingPeriod),
        proposal_wait_for_quiet_deadline_increase: duration(governance.waitForQuietDeadlineIncrease),
        proposal_rejection_fee: tokens(governance.rejectionFee),
        voting_reward_parameters: [
          {
            initial_reward_rate: percentage(governance.initialRewardRate),
            final_reward_rate: percentage(governance.finalRewardRate),
            reward_rate_transition_duration: duration(governance.rewardRateTransitionDuration),
          },
        ],
      },
    ],
    swap_parameters: [
      {
        minimum_participants: [swap.minimumParticipants],
        neurons_fund_participation: [swap.neuronsFundParticipation],
        minimum_direct_participation_icp: tokens(swap.minimumDirectParticipation),
        maximum_direct_participation_icp: tokens(swap.maximumDirectParticipation),
        minimum_participant_icp: tokens(swap.minimumParticipant),
        maximum_participant_icp: tokens(swap.maximumParticipant),
        restricted_countries: [{ iso_codes: [...swap.restrictedCountries] }],
        duration: duration(swap.duration),
        neuron_basket_construction_parameters: [
          {
            count: [swap.basketCount],
            dissolve_delay_interval: duration(swap.basketDissolveDelayInterval),
          },
        ],
      },
    ],
    initial_token_distribution: [
      {
        treasury_distribution: [{ total: tokens(distribution.treasury) }],
        developer_distribution: [
          {
            developer_neurons: [
              {
                controller: [owner],
                dissolve_delay: duration(distribution.developerDissolveDelay),
                memo: [0n],
                vesting_period: duration(distribution.developerVestingPeriod),
                stake: tokens(distribution.developerStake),
              },
            ],
          },
        ],
        swap_distribution: [{ total: tokens(distribution.swap) }],
      },
    ],
  };
};
