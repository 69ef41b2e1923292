import { User } from '../../src/users/types';
import { Pos } from '../../src/pos/types';
import { Review } from '../../src/reviews/types';
import { ApprovalConfiguration, loadApprovalConfiguration } from '../../src/config/approval-config';

export const approvalConfiguration: ApprovalConfiguration = loadApprovalConfiguration(3);

export function userFixtures(): User[] {
  return [
    { id: 1, loginName: 'jane_doe', emailAddress: 'jane.doe@example.com', firstName: 'Jane', lastName: 'Doe' },
    { id: 2, loginName: 'maxmustermann', emailAddress: 'max@example.com', firstName: 'Max', lastName: 'Mustermann' },
    { id: 3, loginName: 'student2023', emailAddress: 'student@example.com', firstName: 'Student', lastName: 'Example' },
  ];
}

export function posFixtures(): Pos[] {
  return [
    {
      id: 1,
      name: 'Schmelzpunkt',
      description: 'Great waffles',
      type: 'CAFE',
      campus: 'ALTSTADT',
      street: 'Hauptstraße',
      houseNumber: '90',
      postalCode: 69117,
      city: 'Heidelberg',
    },
    {
      id: 2,
      name: 'Bäcker Görtz',
      description: 'Walking distance to lecture hall',
      type: 'BAKERY',
      campus: 'INF',
      street: 'Berliner Str.',
      houseNumber: '43',
      postalCode: 69120,
      city: 'Heidelberg',
    },
  ];
}

/** Persisted reviews: the first is by user 1, the second by user 2; both on POS 1 */
export function reviewFixtures(): Review[] {
  const [jane, max] = userFixtures();
  const [schmelzpunkt] = posFixtures();
  return [
    {
      id: 1,
      pos: schmelzpunkt,
      author: jane,
      review: 'Great waffles, friendly staff.',
      approvalCount: 0,
      approved: false,
    },
    {
      id: 2,
      pos: schmelzpunkt,
      author: max,
      review: 'Coffee was a bit too strong for me.',
      approvalCount: 0,
      approved: false,
    },
  ];
}
